/**
 * @fileoverview Scheduling domain types.
 *
 * A schedule is what the user asked for; an event is what the calendar
 * store holds. The resolver sits between the two.
 */

/**
 * Raw user input: free text ("friday 9am - 11am") or a preset id.
 */
export type TimeExpression =
  | { text: string }
  | { preset: string };

/**
 * Un-normalized schedule produced by the phrase grammar and preset rules.
 * Exactly one of `end` / `durationMinutes` is usually present; neither means
 * the default duration applies.
 */
export interface ScheduleDraft {
  start: Date;
  end?: Date;
  durationMinutes?: number;
  isAllDay: boolean;
}

/**
 * Concrete time span ready to hand to the calendar store.
 * Invariant: end > start.
 */
export interface ResolvedSchedule {
  start: Date;
  end: Date;
  isAllDay: boolean;
}

/**
 * Where an event came from: the calendar itself, or a task mirrored into
 * the task list.
 */
export type EventSource = 'calendar' | 'task-list';

/**
 * Event as known to the calendar store. `id` is always store-assigned.
 */
export interface CalendarEvent {
  id: string;
  title: string;
  start: Date;
  end: Date;
  isAllDay: boolean;
  source: EventSource;
}

/**
 * Resolver output, not yet confirmed by the store.
 * `id` is set only when the pending event edits an existing one.
 * `overlaps` lists ids of same-day timed events it intersects, for layout.
 */
export interface PendingEvent {
  id?: string;
  title: string;
  start: Date;
  end: Date;
  isAllDay: boolean;
  source: EventSource;
  overlaps: string[];
}

export interface ScheduleOptions {
  timezone: string;
  defaultDurationMinutes?: number;
}

/** Injected reference clock. */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export const DEFAULT_DURATION_MINUTES = 30;
