/**
 * @fileoverview Natural language time parser.
 *
 * Converts short phrases typed into the "when" field into a concrete
 * schedule. The grammar is a fixed, ordered list of phrase shapes; the first
 * shape whose structure matches decides how the input is read:
 *
 *   1. range     "friday 9am - 11am", "tomorrow 1pm to 2:30pm"
 *   2. point     "tomorrow 2pm", "next monday at 9am for 45 min"
 *   3. relative  "in 30 min", "in an hour"
 *   4. all-day   "friday", "tomorrow all day"
 *   5. date      "march 5 at 3pm" (read by chrono-node)
 *
 * Once a shape matches structurally, a bad time token is reported as
 * UnrecognizedTime rather than falling through to later shapes.
 */

import * as chrono from 'chrono-node';
import { DateTime } from 'luxon';
import {
  DAY_REF_SOURCE,
  atLocalTime,
  formatInTimezone,
  getTimezoneOffsetMinutes,
  localDay,
  parseDayRef,
  resolveDayRef,
} from '../date/index.js';
import { ParseError, fail, type Result } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import { normalizeSchedule } from './normalize.js';
import type { ResolvedSchedule, ScheduleDraft, ScheduleOptions } from './types.js';

const log = createLogger({ domain: 'schedule-parser' });

type Meridiem = 'am' | 'pm';

interface ClockTime {
  hour: number; // 0-23
  minute: number;
}

const TIME = '(noon|midnight|\\d{1,2}(?::\\d{1,2})?\\s*(?:am|pm)?)';
const AMOUNT = '(\\d+|an?)';
const UNIT = '(minutes?|mins?|m|hours?|hrs?|h|days?|d|weeks?|wks?|w)';
const DAY = `(?:on\\s+)?(${DAY_REF_SOURCE})`;
const FOR_DURATION = `(?:\\s+for\\s+${AMOUNT}\\s*${UNIT})?`;

const RANGE_PATTERN = new RegExp(`^(?:${DAY}\\s+)?(?:at\\s+)?${TIME}\\s*(?:-|to|until|till)\\s*${TIME}$`);
const POINT_PATTERN = new RegExp(`^(?:${DAY}\\s+)?(?:at\\s+)?${TIME}${FOR_DURATION}$`);
const RELATIVE_PATTERN = new RegExp(`^in\\s+${AMOUNT}\\s*${UNIT}${FOR_DURATION}$`);
const ALL_DAY_PATTERN = new RegExp(`^${DAY}(?:\\s+all\\s+day)?$`);
const ALL_DAY_FIRST_PATTERN = new RegExp(`^all\\s+day(?:\\s+${DAY})?$`);

const UNIT_MINUTES: Record<'minute' | 'hour' | 'day' | 'week', number> = {
  minute: 1,
  hour: 60,
  day: 24 * 60,
  week: 7 * 24 * 60,
};

const LABEL_FORMAT = "cccc, LLLL dd 'at' hh:mm a";
const ALL_DAY_LABEL_FORMAT = "cccc, LLLL dd '(all day)'";

function normalizeInput(text: string): string {
  return text
    .toLowerCase()
    .replace(/[–—]/g, '-')
    .replace(/\b([ap])\.m\.?/g, '$1m')
    .replace(/\s+/g, ' ')
    .trim();
}

function unrecognizedTime(token: string): ParseError {
  return new ParseError('UnrecognizedTime', `Could not understand time "${token.trim()}"`, {
    tokenLength: token.length,
  });
}

function unparseable(): ParseError {
  return new ParseError('Unparseable', 'Could not parse time');
}

function invalidRange(): ParseError {
  return new ParseError('InvalidRange', 'End time must be after start time');
}

/**
 * Read a time token strictly. Clock hours need am/pm; a bare hour is only
 * accepted when it can only be a 24-hour reading (0 or 13-23).
 */
function readTime(token: string): (ClockTime & { meridiem?: Meridiem }) | null {
  const value = token.trim();
  if (value === 'noon') return { hour: 12, minute: 0, meridiem: 'pm' };
  if (value === 'midnight') return { hour: 0, minute: 0, meridiem: 'am' };

  const match = value.match(/^(\d{1,2})(?::(\d{2}))?\s*(am|pm)?$/);
  if (!match) return null;

  const hour = parseInt(match[1], 10);
  const minute = match[2] ? parseInt(match[2], 10) : 0;
  const meridiem = match[3] === 'am' || match[3] === 'pm' ? match[3] : undefined;

  if (minute > 59) return null;

  if (meridiem) {
    if (hour < 1 || hour > 12) return null;
    return { hour: (hour % 12) + (meridiem === 'pm' ? 12 : 0), minute, meridiem };
  }

  if (hour === 0 || (hour >= 13 && hour <= 23)) {
    return { hour, minute };
  }
  return null;
}

/**
 * Read the end of a range. Without its own am/pm an end hour takes the
 * start's half of the day; an inherited "am" that would end before the start
 * moves to the afternoon ("11am - 1" ends at 13:00).
 */
function readRangeEnd(token: string, start: ClockTime): ClockTime | null {
  const value = token.trim();
  const bare = value.match(/^(\d{1,2})(?::(\d{2}))?$/);
  if (!bare) return readTime(value);

  const hour = parseInt(bare[1], 10);
  const minute = bare[2] ? parseInt(bare[2], 10) : 0;
  if (hour < 1 || hour > 12 || minute > 59) {
    return readTime(value);
  }

  const inherited: Meridiem = start.hour < 12 ? 'am' : 'pm';
  let hour24 = (hour % 12) + (inherited === 'pm' ? 12 : 0);
  if (inherited === 'am' && hour24 * 60 + minute <= start.hour * 60 + start.minute) {
    hour24 += 12;
  }
  return { hour: hour24, minute };
}

function unitMinutes(unit: string): number {
  if (unit.startsWith('w')) return UNIT_MINUTES.week;
  if (unit.startsWith('d')) return UNIT_MINUTES.day;
  if (unit.startsWith('h')) return UNIT_MINUTES.hour;
  return UNIT_MINUTES.minute;
}

function readAmount(amount: string): number {
  return amount === 'a' || amount === 'an' ? 1 : parseInt(amount, 10);
}

function resolveDay(dayToken: string | undefined, referenceNow: Date, timezone: string): DateTime {
  const ref = dayToken ? parseDayRef(dayToken) : null;
  return ref ? resolveDayRef(ref, referenceNow, timezone) : localDay(referenceNow, timezone);
}

function finish(
  draft: ScheduleDraft,
  shape: string,
  options: ScheduleOptions
): Result<ResolvedSchedule, ParseError> {
  const normalized = normalizeSchedule(draft, options);
  if (!normalized.success) {
    return fail(invalidRange());
  }
  log.debug('parse_succeeded', { shape, isAllDay: normalized.data.isAllDay });
  return normalized;
}

function parseRange(
  match: RegExpMatchArray,
  referenceNow: Date,
  options: ScheduleOptions
): Result<ResolvedSchedule, ParseError> {
  const [, dayToken, startToken, endToken] = match;

  const startTime = readTime(startToken);
  if (!startTime) return fail(unrecognizedTime(startToken));
  const endTime = readRangeEnd(endToken, startTime);
  if (!endTime) return fail(unrecognizedTime(endToken));

  const day = resolveDay(dayToken, referenceNow, options.timezone);
  const start = atLocalTime(day, startTime.hour, startTime.minute);
  if (!start) return fail(unrecognizedTime(startToken));
  const end = atLocalTime(day, endTime.hour, endTime.minute);
  if (!end) return fail(unrecognizedTime(endToken));

  if (end <= start) {
    return fail(invalidRange());
  }

  return finish({ start: start.toJSDate(), end: end.toJSDate(), isAllDay: false }, 'range', options);
}

function parsePoint(
  match: RegExpMatchArray,
  referenceNow: Date,
  options: ScheduleOptions
): Result<ResolvedSchedule, ParseError> {
  const [, dayToken, timeToken, amount, unit] = match;

  const time = readTime(timeToken);
  if (!time) return fail(unrecognizedTime(timeToken));

  const day = resolveDay(dayToken, referenceNow, options.timezone);
  const start = atLocalTime(day, time.hour, time.minute);
  if (!start) return fail(unrecognizedTime(timeToken));

  const durationMinutes = amount && unit ? readAmount(amount) * unitMinutes(unit) : undefined;
  return finish({ start: start.toJSDate(), durationMinutes, isAllDay: false }, 'point', options);
}

function parseRelative(
  match: RegExpMatchArray,
  referenceNow: Date,
  options: ScheduleOptions
): Result<ResolvedSchedule, ParseError> {
  const [, amount, unit, durationAmount, durationUnit] = match;

  const offsetMinutes = readAmount(amount) * unitMinutes(unit);
  const reference = DateTime.fromJSDate(referenceNow, { zone: options.timezone });
  // Day and week offsets follow the local calendar across DST changes.
  const start = unit.startsWith('w') || unit.startsWith('d')
    ? reference.plus({ days: offsetMinutes / UNIT_MINUTES.day })
    : reference.plus({ minutes: offsetMinutes });
  if (!start.isValid || !Number.isFinite(start.toJSDate().getTime())) {
    return fail(unrecognizedTime(`in ${amount} ${unit}`));
  }

  const durationMinutes = durationAmount && durationUnit
    ? readAmount(durationAmount) * unitMinutes(durationUnit)
    : undefined;
  return finish({ start: start.toJSDate(), durationMinutes, isAllDay: false }, 'relative', options);
}

function parseAllDay(
  dayToken: string | undefined,
  referenceNow: Date,
  options: ScheduleOptions
): Result<ResolvedSchedule, ParseError> {
  const day = resolveDay(dayToken, referenceNow, options.timezone);
  return finish({ start: day.toJSDate(), isAllDay: true }, 'all_day', options);
}

/**
 * Explicit calendar dates ("march 5 at 3pm", "jan 15"), read by chrono-node.
 * Only accepted when chrono consumes the whole input and is certain of the
 * month and day.
 */
function parseCalendarDate(
  input: string,
  referenceNow: Date,
  options: ScheduleOptions
): Result<ResolvedSchedule, ParseError> | null {
  const offset = getTimezoneOffsetMinutes(referenceNow, options.timezone);
  const results = chrono.parse(
    input,
    { instant: referenceNow, timezone: offset },
    { forwardDate: true }
  );

  const first = results[0];
  if (!first || first.text.trim() !== input) return null;

  const parsed = first.start;
  if (!parsed.isCertain('month') || !parsed.isCertain('day')) return null;

  const year = parsed.get('year');
  const month = parsed.get('month');
  const dayOfMonth = parsed.get('day');
  if (year == null || month == null || dayOfMonth == null) return null;

  const day = DateTime.fromObject({ year, month, day: dayOfMonth }, { zone: options.timezone });
  if (!day.isValid) return fail(unparseable());

  if (!parsed.isCertain('hour')) {
    return finish({ start: day.toJSDate(), isAllDay: true }, 'date', options);
  }

  const start = atLocalTime(day, parsed.get('hour') ?? 0, parsed.get('minute') ?? 0);
  if (!start) return fail(unrecognizedTime(first.text));

  if (first.end && first.end.isCertain('hour')) {
    const endDay = DateTime.fromObject(
      {
        year: first.end.get('year') ?? year,
        month: first.end.get('month') ?? month,
        day: first.end.get('day') ?? dayOfMonth,
      },
      { zone: options.timezone }
    );
    if (!endDay.isValid) return fail(unparseable());
    const end = atLocalTime(endDay, first.end.get('hour') ?? 0, first.end.get('minute') ?? 0);
    if (!end) return fail(unrecognizedTime(first.text));
    if (end <= start) return fail(invalidRange());
    return finish({ start: start.toJSDate(), end: end.toJSDate(), isAllDay: false }, 'date_range', options);
  }

  return finish({ start: start.toJSDate(), isAllDay: false }, 'date', options);
}

/**
 * Parse a free-text time expression against a reference "now".
 *
 * Pure: the same text, reference and options always yield the same
 * schedule. Missing day-refs mean today; weekday names resolve to the
 * nearest occurrence on or after today.
 */
export function parseTimeExpression(
  text: string,
  referenceNow: Date,
  options: ScheduleOptions
): Result<ResolvedSchedule, ParseError> {
  const input = normalizeInput(text);
  if (!input) {
    return fail(unparseable());
  }

  const range = input.match(RANGE_PATTERN);
  if (range) return parseRange(range, referenceNow, options);

  const point = input.match(POINT_PATTERN);
  if (point) return parsePoint(point, referenceNow, options);

  const relative = input.match(RELATIVE_PATTERN);
  if (relative) return parseRelative(relative, referenceNow, options);

  const allDay = input.match(ALL_DAY_PATTERN) ?? input.match(ALL_DAY_FIRST_PATTERN);
  if (allDay) return parseAllDay(allDay[1], referenceNow, options);

  const calendarDate = parseCalendarDate(input, referenceNow, options);
  if (calendarDate) return calendarDate;

  log.debug('parse_failed', { kind: 'Unparseable', inputLength: input.length });
  return fail(unparseable());
}

/**
 * Inline confirmation label, e.g. "Friday, January 05 at 09:00 AM".
 */
export function describeSchedule(schedule: ResolvedSchedule, timezone: string): string {
  return formatInTimezone(
    schedule.start,
    timezone,
    schedule.isAllDay ? ALL_DAY_LABEL_FORMAT : LABEL_FORMAT
  );
}
