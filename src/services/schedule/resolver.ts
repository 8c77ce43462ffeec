/**
 * @fileoverview Scheduling resolver.
 *
 * Turns schedules and drag edits into pending events and annotates which
 * existing events they overlap. Overlap never blocks placement; the
 * annotation only tells the week grid what to lay out side by side.
 */

import { ResolverError, fail, ok, type Result } from '../../utils/errors.js';
import type {
  CalendarEvent,
  EventSource,
  PendingEvent,
  ResolvedSchedule,
} from './types.js';

interface Span {
  start: Date;
  end: Date;
  isAllDay: boolean;
}

/**
 * Ids of timed events intersecting the half-open span [start, end).
 * All-day events live in their own row and never overlap timed ones.
 */
export function findOverlaps(
  candidate: Span,
  existing: readonly CalendarEvent[],
  selfId?: string
): string[] {
  if (candidate.isAllDay) return [];

  const start = candidate.start.getTime();
  const end = candidate.end.getTime();

  return existing
    .filter((event) => event.id !== selfId && !event.isAllDay)
    .filter((event) => event.start.getTime() < end && start < event.end.getTime())
    .map((event) => event.id);
}

function invalidDuration(start: Date, end: Date): ResolverError {
  return new ResolverError('InvalidDuration', 'End time must be after start time', {
    start,
    end,
  });
}

/**
 * Validate a schedule for a new event and annotate its overlaps.
 */
export function resolveEvent(
  schedule: ResolvedSchedule,
  title: string,
  existing: readonly CalendarEvent[],
  source: EventSource = 'calendar'
): Result<PendingEvent, ResolverError> {
  const trimmed = title.trim();
  if (!trimmed) {
    return fail(new ResolverError('MissingTitle', 'Please enter a task name'));
  }
  if (schedule.end.getTime() <= schedule.start.getTime()) {
    return fail(invalidDuration(schedule.start, schedule.end));
  }

  return ok({
    title: trimmed,
    start: schedule.start,
    end: schedule.end,
    isAllDay: schedule.isAllDay,
    source,
    overlaps: findOverlaps(schedule, existing),
  });
}

function toPending(
  event: CalendarEvent,
  start: Date,
  end: Date,
  existing: readonly CalendarEvent[]
): PendingEvent {
  const span = { start, end, isAllDay: event.isAllDay };
  return {
    id: event.id,
    title: event.title,
    start,
    end,
    isAllDay: event.isAllDay,
    source: event.source,
    overlaps: findOverlaps(span, existing, event.id),
  };
}

/**
 * Drag-and-drop move: only the start changes, the duration is kept.
 */
export function moveEvent(
  event: CalendarEvent,
  newStart: Date,
  existing: readonly CalendarEvent[]
): Result<PendingEvent, ResolverError> {
  if (Number.isNaN(newStart.getTime())) {
    return fail(new ResolverError('InvalidDuration', 'New start time is not a valid date'));
  }
  const length = event.end.getTime() - event.start.getTime();
  const end = new Date(newStart.getTime() + length);
  if (length <= 0) {
    return fail(invalidDuration(newStart, end));
  }
  return ok(toPending(event, newStart, end, existing));
}

/**
 * Drag-and-drop resize: either edge may move and the duration is
 * recomputed. The original event is never modified.
 */
export function resizeEvent(
  event: CalendarEvent,
  edges: { start?: Date; end?: Date },
  existing: readonly CalendarEvent[]
): Result<PendingEvent, ResolverError> {
  const start = edges.start ?? event.start;
  const end = edges.end ?? event.end;

  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime()) || end.getTime() <= start.getTime()) {
    return fail(invalidDuration(start, end));
  }
  return ok(toPending(event, start, end, existing));
}

/**
 * The schedule part of a pending event, as the calendar store takes it.
 */
export function toSchedule(pending: PendingEvent): ResolvedSchedule {
  return { start: pending.start, end: pending.end, isAllDay: pending.isAllDay };
}

