/**
 * @fileoverview Agenda session factory.
 *
 * Wires the configured calendar store and task list into one session.
 * Singleton pattern - returns the same instance on repeated calls.
 */

import config from '../../config.js';
import { getCalendarStore } from '../calendar/index.js';
import { getTaskList } from '../tasks/index.js';
import { systemClock } from '../schedule/types.js';
import { AgendaSession } from './session.js';
import { NoticeBoard } from './notices.js';

export { AgendaSession } from './session.js';
export { NoticeBoard } from './notices.js';
export type {
  AddTaskInput,
  AgendaSessionOptions,
  InlineFeedback,
  Notice,
  NoticeLevel,
  Notifier,
  ScheduledEvent,
  SessionError,
} from './types.js';

let session: AgendaSession | null = null;
let noticeBoard: NoticeBoard | null = null;

export function getNoticeBoard(): NoticeBoard {
  if (!noticeBoard) {
    noticeBoard = new NoticeBoard();
  }
  return noticeBoard;
}

export function getAgendaSession(): AgendaSession {
  if (session) {
    return session;
  }

  session = new AgendaSession({
    store: getCalendarStore(),
    tasks: getTaskList(),
    clock: systemClock,
    timezone: config.schedule.timezone,
    defaultDurationMinutes: config.schedule.defaultDurationMinutes,
    storeTimeoutMs: config.schedule.storeTimeoutMs,
    grid: config.grid,
    notifier: getNoticeBoard(),
  });
  return session;
}

/**
 * Reset the session and its notice board.
 * Useful for tests to start from an empty cache.
 */
export function resetAgendaSession(): void {
  session = null;
  noticeBoard = null;
}
