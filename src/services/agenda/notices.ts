/**
 * @fileoverview Bounded in-memory notice board.
 *
 * Keeps the most recent notices so a client polling the API can show them
 * as transient toasts. Oldest notices fall off first.
 */

import type { Notice, Notifier } from './types.js';

const DEFAULT_CAPACITY = 20;

export class NoticeBoard implements Notifier {
  private readonly notices: Notice[] = [];

  constructor(private readonly capacity = DEFAULT_CAPACITY) {}

  notify(notice: Notice): void {
    this.notices.push(notice);
    const overflow = this.notices.length - this.capacity;
    if (overflow > 0) {
      this.notices.splice(0, overflow);
    }
  }

  /** Notices newer than `since` (all when omitted), oldest first. */
  recent(since?: Date): Notice[] {
    if (!since) return [...this.notices];
    return this.notices.filter((notice) => notice.at.getTime() > since.getTime());
  }

  clear(): void {
    this.notices.length = 0;
  }
}
