/**
 * @fileoverview Task list factory.
 *
 * Singleton pattern - returns the same instance on repeated calls.
 */

import config from '../../config.js';
import type { TaskList } from './types.js';
import { ThingsTaskList } from './things.js';
import { MemoryTaskList } from './memory.js';

export type { TaskList } from './types.js';
export type { ScriptRunner, ThingsOptions } from './things.js';
export type { RecordedTask } from './memory.js';
export { ThingsTaskList, buildThingsScript, appleScriptString } from './things.js';
export { MemoryTaskList } from './memory.js';

let instance: TaskList | null = null;

/**
 * Get the task list instance.
 *
 * Based on TASK_LIST_PROVIDER:
 * - 'things': Things 3 via osascript (default)
 * - 'memory': In-memory list (offline use and tests)
 */
export function getTaskList(): TaskList {
  if (instance) {
    return instance;
  }

  switch (config.tasks.provider) {
    case 'things':
      instance = new ThingsTaskList({
        appName: config.tasks.thingsAppName,
        listName: config.tasks.thingsListName,
        timezone: config.schedule.timezone,
      });
      break;
    case 'memory':
      instance = new MemoryTaskList();
      break;
    default:
      throw new Error(`Invalid TASK_LIST_PROVIDER: ${config.tasks.provider}. Expected 'things' or 'memory'.`);
  }

  return instance;
}

/**
 * Reset the task list instance.
 * Useful for tests to get a fresh list.
 */
export function resetTaskList(): void {
  instance = null;
}
