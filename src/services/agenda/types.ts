/**
 * @fileoverview Agenda session types.
 */

import type { CalendarStore } from '../calendar/types.js';
import type { TaskList } from '../tasks/types.js';
import type { Clock, CalendarEvent, ResolvedSchedule } from '../schedule/types.js';
import type { GridGeometry } from '../week/view.js';
import type {
  ParseError,
  ParseErrorKind,
  ResolverError,
  StoreError,
} from '../../utils/errors.js';

export type NoticeLevel = 'info' | 'error';

/** Transient user-facing notification ("Event moved", "Failed to add task"). */
export interface Notice {
  level: NoticeLevel;
  message: string;
  at: Date;
}

export interface Notifier {
  notify(notice: Notice): void;
}

/**
 * Feedback shown under the input while the user types.
 */
export type InlineFeedback =
  | { ok: true; label: string; schedule: ResolvedSchedule; durationMinutes: number }
  | { ok: false; kind: ParseErrorKind; message: string };

export interface AddTaskInput {
  title: string;
  /** Free-text time expression. Ignored when `preset` is given. */
  when?: string;
  preset?: string;
  /** Overrides the parsed or default duration (timed events only). */
  durationMinutes?: number;
  /** Mirror the new event into the task list. Defaults to true. */
  mirrorToTasks?: boolean;
}

/** A confirmed event plus the same-day events it overlaps. */
export interface ScheduledEvent {
  event: CalendarEvent;
  overlaps: string[];
}

export type SessionError = ParseError | ResolverError | StoreError;

export interface AgendaSessionOptions {
  store: CalendarStore;
  tasks: TaskList;
  clock: Clock;
  timezone: string;
  defaultDurationMinutes: number;
  storeTimeoutMs: number;
  grid: GridGeometry;
  notifier?: Notifier;
}
