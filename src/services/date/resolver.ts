/**
 * @fileoverview Shared calendar-day utilities: day references, local times
 * and timezone-aware formatting.
 *
 * All arithmetic happens in the user's IANA timezone through Luxon, so
 * "tomorrow" and "friday" mean local calendar days regardless of the host's
 * zone.
 */

import { DateTime } from 'luxon';
import { createLogger } from '../../utils/observability/index.js';

const log = createLogger({ domain: 'date-resolver' });

/**
 * A phrase component naming a calendar date.
 * `strict` weekdays ("next friday") never resolve to today.
 */
export type DayRef =
  | { kind: 'today' }
  | { kind: 'tomorrow' }
  | { kind: 'weekday'; weekday: number; strict: boolean };

/** Luxon weekday numbers: 1=Monday .. 7=Sunday. */
export const WEEKDAY_MAP: Record<string, number> = {
  monday: 1,
  mon: 1,
  tuesday: 2,
  tue: 2,
  tues: 2,
  wednesday: 3,
  wed: 3,
  thursday: 4,
  thu: 4,
  thur: 4,
  thurs: 4,
  friday: 5,
  fri: 5,
  saturday: 6,
  sat: 6,
  sunday: 7,
  sun: 7,
};

/** Regex source matching any day-ref token accepted by {@link parseDayRef}. */
export const DAY_REF_SOURCE =
  `(?:today|tomorrow|tmrw|(?:next\\s+)?(?:${Object.keys(WEEKDAY_MAP).sort((a, b) => b.length - a.length).join('|')}))`;

export function parseDayRef(token: string): DayRef | null {
  const normalized = token.trim().toLowerCase().replace(/\s+/g, ' ');
  if (normalized === 'today') return { kind: 'today' };
  if (normalized === 'tomorrow' || normalized === 'tmrw') return { kind: 'tomorrow' };

  const match = normalized.match(/^(next )?([a-z]+)$/);
  if (!match) return null;
  const weekday = WEEKDAY_MAP[match[2]];
  if (!weekday) return null;
  return { kind: 'weekday', weekday, strict: match[1] !== undefined };
}

/**
 * Start of the local calendar day containing `date`.
 */
export function localDay(date: Date, timezone: string): DateTime {
  return DateTime.fromJSDate(date, { zone: 'utc' }).setZone(timezone).startOf('day');
}

/**
 * Resolve a day-ref to the start of a local calendar day.
 *
 * Plain weekdays resolve to the nearest occurrence on or after the
 * reference date; strict ones to the nearest occurrence after it.
 */
export function resolveDayRef(ref: DayRef, referenceNow: Date, timezone: string): DateTime {
  const today = localDay(referenceNow, timezone);

  switch (ref.kind) {
    case 'today':
      return today;
    case 'tomorrow':
      return today.plus({ days: 1 });
    case 'weekday': {
      let daysAhead = (ref.weekday - today.weekday + 7) % 7;
      if (ref.strict && daysAhead === 0) {
        daysAhead = 7;
      }
      return today.plus({ days: daysAhead });
    }
  }
}

/**
 * Place a wall-clock time on a local day.
 * Returns null when the time does not exist on that day (DST gap).
 */
export function atLocalTime(day: DateTime, hour: number, minute: number): DateTime | null {
  const candidate = DateTime.fromObject(
    { year: day.year, month: day.month, day: day.day, hour, minute },
    { zone: day.zone }
  );

  if (!candidate.isValid || candidate.hour !== hour || candidate.minute !== minute) {
    log.debug('local_time_skipped', { hour, minute, zone: day.zoneName });
    return null;
  }

  return candidate;
}

/**
 * Validate IANA timezone string.
 */
export function isValidTimezone(timezone: string): boolean {
  return DateTime.now().setZone(timezone).isValid;
}

/**
 * Get timezone offset in minutes for a given date and timezone.
 * Handles DST correctly.
 */
export function getTimezoneOffsetMinutes(date: Date, timezone: string): number {
  const dt = DateTime.fromJSDate(date, { zone: 'utc' }).setZone(timezone);
  if (!dt.isValid) {
    throw new Error(`Invalid timezone: "${timezone}"`);
  }
  return dt.offset;
}

/**
 * Format a date in the user's timezone with a Luxon format string.
 */
export function formatInTimezone(date: Date, timezone: string, format: string): string {
  const dt = DateTime.fromJSDate(date, { zone: 'utc' }).setZone(timezone).setLocale('en-US');
  if (!dt.isValid) {
    return date.toISOString();
  }
  return dt.toFormat(format);
}
