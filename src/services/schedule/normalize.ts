/**
 * @fileoverview Schedule normalization shared by the phrase parser and the
 * preset resolver.
 */

import { DateTime } from 'luxon';
import { ResolverError, fail, ok, type Result } from '../../utils/errors.js';
import {
  DEFAULT_DURATION_MINUTES,
  type ResolvedSchedule,
  type ScheduleDraft,
  type ScheduleOptions,
} from './types.js';

const MINUTE_MS = 60 * 1000;

// Invalid Dates compare false both ways, so they are rejected before any
// ordering check.
function isRepresentable(date: Date): boolean {
  return Number.isFinite(date.getTime());
}

function outOfRange(context: Record<string, unknown>): ResolverError {
  return new ResolverError('InvalidDuration', 'Schedule is outside the supported date range', context);
}

/**
 * Turn a draft into a concrete span.
 *
 * - explicit end: kept, must be after start
 * - duration: end = start + duration
 * - neither: end = start + default duration
 *
 * All-day drafts without an end cover one local day.
 */
export function normalizeSchedule(
  draft: ScheduleDraft,
  options: ScheduleOptions
): Result<ResolvedSchedule, ResolverError> {
  let end: Date;

  if (draft.end) {
    end = draft.end;
  } else if (draft.isAllDay) {
    end = DateTime.fromJSDate(draft.start, { zone: options.timezone }).plus({ days: 1 }).toJSDate();
  } else {
    const minutes = draft.durationMinutes ?? options.defaultDurationMinutes ?? DEFAULT_DURATION_MINUTES;
    end = new Date(draft.start.getTime() + minutes * MINUTE_MS);
  }

  if (!isRepresentable(draft.start) || !isRepresentable(end)) {
    return fail(outOfRange({ start: draft.start, end }));
  }
  if (end.getTime() <= draft.start.getTime()) {
    return fail(new ResolverError('InvalidDuration', 'End time must be after start time', {
      start: draft.start,
      end,
    }));
  }

  return ok({ start: draft.start, end, isAllDay: draft.isAllDay });
}

/**
 * Re-derive `end` from `start` with a new duration (duration presets,
 * manual duration field). All-day schedules keep their day span.
 */
export function applyDuration(
  schedule: ResolvedSchedule,
  minutes: number
): Result<ResolvedSchedule, ResolverError> {
  if (!Number.isFinite(minutes) || minutes <= 0) {
    return fail(new ResolverError('InvalidDuration', 'Duration must be a positive number of minutes', {
      minutes,
    }));
  }
  if (schedule.isAllDay) {
    return ok(schedule);
  }
  const end = new Date(schedule.start.getTime() + minutes * MINUTE_MS);
  if (!isRepresentable(end)) {
    return fail(outOfRange({ minutes }));
  }
  return ok({ start: schedule.start, end, isAllDay: false });
}

export function durationMinutes(span: { start: Date; end: Date }): number {
  return Math.round((span.end.getTime() - span.start.getTime()) / MINUTE_MS);
}
