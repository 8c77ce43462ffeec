/**
 * @fileoverview Task list interface.
 *
 * Mirroring is fire-and-forget: no id comes back and nothing is read back.
 * Implementations resolve to false on failure instead of throwing.
 */

export interface TaskList {
  addTask(title: string, dueTime: Date): Promise<boolean>;
}
