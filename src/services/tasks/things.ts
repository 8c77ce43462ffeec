/**
 * @fileoverview Things 3 task list, driven through AppleScript.
 *
 * Each task becomes a to-do in the configured list (normally "Today") with
 * its scheduled time in the notes. Only available on macOS; anywhere else
 * osascript is missing and addTask resolves to false.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { safeExecute } from '../../utils/errors.js';
import { createLogger, safeSnippet } from '../../utils/observability/index.js';
import { formatInTimezone } from '../date/index.js';
import type { TaskList } from './types.js';

const log = createLogger({ domain: 'things' });
const execFileAsync = promisify(execFile);

const SCRIPT_TIMEOUT_MS = 10000;
const NOTES_FORMAT = "h:mm a 'on' cccc, LLLL dd";

export interface ThingsOptions {
  appName: string;
  listName: string;
  timezone: string;
}

/** Runs an AppleScript source; rejects when the script fails. */
export type ScriptRunner = (script: string) => Promise<void>;

export const runOsascript: ScriptRunner = async (script) => {
  await execFileAsync('osascript', ['-e', script], { timeout: SCRIPT_TIMEOUT_MS });
};

/**
 * Quote a value as an AppleScript string literal.
 */
export function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function buildThingsScript(
  title: string,
  dueTime: Date,
  options: ThingsOptions
): string {
  const notes = `Scheduled: ${formatInTimezone(dueTime, options.timezone, NOTES_FORMAT)}`;
  return [
    `tell application ${appleScriptString(options.appName)}`,
    `  set newToDo to make new to do with properties {name:${appleScriptString(title)}, notes:${appleScriptString(notes)}}`,
    `  move newToDo to list ${appleScriptString(options.listName)}`,
    'end tell',
  ].join('\n');
}

export class ThingsTaskList implements TaskList {
  constructor(
    private readonly options: ThingsOptions,
    private readonly run: ScriptRunner = runOsascript
  ) {}

  async addTask(title: string, dueTime: Date): Promise<boolean> {
    const script = buildThingsScript(title, dueTime, this.options);
    const result = await safeExecute(() => this.run(script), 'things.addTask');

    if (!result.success) {
      log.warn('add_task_failed', { list: this.options.listName, error: safeSnippet(result.error) });
      return false;
    }

    log.info('add_task_succeeded', { list: this.options.listName });
    return true;
  }
}
