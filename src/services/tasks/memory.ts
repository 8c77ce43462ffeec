/**
 * @fileoverview In-memory task list for offline use and tests.
 */

import type { TaskList } from './types.js';

export interface RecordedTask {
  title: string;
  dueTime: Date;
}

export class MemoryTaskList implements TaskList {
  private tasks: RecordedTask[] = [];

  async addTask(title: string, dueTime: Date): Promise<boolean> {
    this.tasks.push({ title, dueTime: new Date(dueTime) });
    return true;
  }

  /** Tasks added so far, oldest first. */
  list(): RecordedTask[] {
    return [...this.tasks];
  }

  clear(): void {
    this.tasks = [];
  }
}
