/**
 * Unit tests for the Things task list.
 */

import { describe, it, expect, vi } from 'vitest';

const { mockExecFile } = vi.hoisted(() => ({
  mockExecFile: vi.fn(
    (_file: string, _args: string[], _options: object, callback: (error: Error | null, stdout: string) => void) => {
      callback(null, '');
    }
  ),
}));

vi.mock('child_process', () => ({
  execFile: mockExecFile,
}));

import {
  ThingsTaskList,
  buildThingsScript,
  appleScriptString,
  runOsascript,
} from '../../../src/services/tasks/things.js';

const options = { appName: 'Things3', listName: 'Today', timezone: 'UTC' };
const due = new Date('2024-01-05T14:00:00Z');

describe('appleScriptString', () => {
  it('quotes and escapes backslashes and double quotes', () => {
    expect(appleScriptString('plain')).toBe('"plain"');
    expect(appleScriptString('Call "Bob"')).toBe('"Call \\"Bob\\""');
    expect(appleScriptString('C:\\temp')).toBe('"C:\\\\temp"');
  });
});

describe('buildThingsScript', () => {
  it('creates a to-do with the scheduled time and moves it to the list', () => {
    expect(buildThingsScript('Write report', due, options)).toBe(
      [
        'tell application "Things3"',
        '  set newToDo to make new to do with properties {name:"Write report", notes:"Scheduled: 2:00 PM on Friday, January 05"}',
        '  move newToDo to list "Today"',
        'end tell',
      ].join('\n')
    );
  });

  it('formats the scheduled time in the configured timezone', () => {
    const script = buildThingsScript('Gym', due, { ...options, timezone: 'America/New_York' });
    expect(script).toContain('notes:"Scheduled: 9:00 AM on Friday, January 05"');
  });

  it('escapes titles so they cannot break out of the string', () => {
    const script = buildThingsScript('Say "hi"', due, options);
    expect(script).toContain('{name:"Say \\"hi\\"", notes:');
  });
});

describe('ThingsTaskList', () => {
  it('runs the script and resolves true on success', async () => {
    const run = vi.fn(async (_script: string) => undefined);
    const list = new ThingsTaskList(options, run);

    await expect(list.addTask('Write report', due)).resolves.toBe(true);
    expect(run).toHaveBeenCalledWith(buildThingsScript('Write report', due, options));
  });

  it('resolves false instead of throwing when the script fails', async () => {
    const run = vi.fn(async (_script: string) => {
      throw new Error('Things3 got an error: Can’t get list "Today".');
    });
    const list = new ThingsTaskList(options, run);

    await expect(list.addTask('Write report', due)).resolves.toBe(false);
  });
});

describe('runOsascript', () => {
  it('passes the script to osascript with a timeout', async () => {
    await runOsascript('return 1');

    expect(mockExecFile).toHaveBeenCalledWith(
      'osascript',
      ['-e', 'return 1'],
      { timeout: 10000 },
      expect.any(Function)
    );
  });

  it('rejects when osascript fails', async () => {
    mockExecFile.mockImplementationOnce((_file, _args, _options, callback) => {
      callback(new Error('osascript: command not found'), '');
    });

    await expect(runOsascript('return 1')).rejects.toThrow('osascript: command not found');
  });
});
