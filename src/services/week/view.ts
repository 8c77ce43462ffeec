/**
 * @fileoverview Week view state and projections.
 *
 * The displayed week is a plain value passed around and replaced through
 * the functions below; nothing here holds module state. Weeks run Monday
 * 00:00 to the next Monday 00:00 in the user's timezone.
 */

import { DateTime } from 'luxon';
import { localDay } from '../date/index.js';
import { findOverlaps } from '../schedule/resolver.js';
import type { CalendarEvent } from '../schedule/types.js';

export interface WeekWindow {
  timezone: string;
  /** Weeks away from the week containing "today" (0 = current). */
  weekOffset: number;
  start: Date;
  end: Date;
}

export type EventStatus = 'completed' | 'in-progress' | 'upcoming';

export interface EventView extends CalendarEvent {
  status: EventStatus;
  overlaps: string[];
}

export interface DayColumn {
  date: string; // yyyy-MM-dd
  weekday: string; // Mon .. Sun
  dayOfMonth: number;
  isToday: boolean;
  timed: EventView[];
  allDay: EventView[];
}

export interface WeekProjection {
  label: string;
  weekOffset: number;
  isCurrentWeek: boolean;
  start: Date;
  end: Date;
  days: DayColumn[];
}

export interface GridGeometry {
  startHour: number;
  snapMinutes: number;
}

const DAYS_PER_WEEK = 7;

function inZone(date: Date, timezone: string): DateTime {
  return DateTime.fromJSDate(date, { zone: 'utc' }).setZone(timezone);
}

export function createWeekWindow(now: Date, timezone: string, weekOffset = 0): WeekWindow {
  const monday = localDay(now, timezone).startOf('week').plus({ weeks: weekOffset });
  return {
    timezone,
    weekOffset,
    start: monday.toJSDate(),
    end: monday.plus({ weeks: 1 }).toJSDate(),
  };
}

export function shiftWeek(window: WeekWindow, direction: number): WeekWindow {
  const monday = inZone(window.start, window.timezone).plus({ weeks: direction });
  return {
    timezone: window.timezone,
    weekOffset: window.weekOffset + direction,
    start: monday.toJSDate(),
    end: monday.plus({ weeks: 1 }).toJSDate(),
  };
}

export function goToToday(window: WeekWindow, now: Date): WeekWindow {
  return createWeekWindow(now, window.timezone, 0);
}

export function containsDate(window: WeekWindow, date: Date): boolean {
  const time = date.getTime();
  return time >= window.start.getTime() && time < window.end.getTime();
}

export function isCurrentWeek(window: WeekWindow, now: Date): boolean {
  return containsDate(window, now);
}

/**
 * Events starting on the same local calendar day as `day`.
 */
export function eventsOnDay<T extends CalendarEvent>(
  events: readonly T[],
  day: Date,
  timezone: string
): T[] {
  const target = localDay(day, timezone).toISODate();
  return events.filter((event) => localDay(event.start, timezone).toISODate() === target);
}

export function eventStatus(event: CalendarEvent, now: Date): EventStatus {
  const time = now.getTime();
  if (event.end.getTime() < time) return 'completed';
  if (event.start.getTime() <= time) return 'in-progress';
  return 'upcoming';
}

function byStart(a: CalendarEvent, b: CalendarEvent): number {
  return a.start.getTime() - b.start.getTime();
}

function toView(event: CalendarEvent, now: Date, sameDay: readonly CalendarEvent[]): EventView {
  return {
    ...event,
    status: eventStatus(event, now),
    overlaps: findOverlaps(event, sameDay, event.id),
  };
}

/**
 * Lay the cached events out over the seven day columns of a window.
 * Events starting outside the window are left out.
 */
export function projectWeek(
  window: WeekWindow,
  events: readonly CalendarEvent[],
  now: Date
): WeekProjection {
  const monday = inZone(window.start, window.timezone);
  const todayIso = localDay(now, window.timezone).toISODate();
  const buckets: CalendarEvent[][] = Array.from({ length: DAYS_PER_WEEK }, () => []);

  for (const event of events) {
    const eventDay = localDay(event.start, window.timezone);
    const index = Math.round(eventDay.diff(monday, 'days').days);
    if (index >= 0 && index < DAYS_PER_WEEK) {
      buckets[index].push(event);
    }
  }

  const days = buckets.map((bucket, index): DayColumn => {
    const date = monday.plus({ days: index });
    const sorted = [...bucket].sort(byStart);
    const timed = sorted.filter((event) => !event.isAllDay);
    return {
      date: date.toISODate() ?? '',
      weekday: date.setLocale('en-US').toFormat('ccc'),
      dayOfMonth: date.day,
      isToday: date.toISODate() === todayIso,
      timed: timed.map((event) => toView(event, now, timed)),
      allDay: sorted.filter((event) => event.isAllDay).map((event) => toView(event, now, [])),
    };
  });

  const sunday = monday.plus({ days: DAYS_PER_WEEK - 1 }).setLocale('en-US');
  return {
    label: `${monday.setLocale('en-US').toFormat('LLLL d')} — ${sunday.toFormat('LLLL d')}`,
    weekOffset: window.weekOffset,
    isCurrentWeek: isCurrentWeek(window, now),
    start: window.start,
    end: window.end,
    days,
  };
}

/**
 * Today's timed events in start order, for the sidebar agenda.
 */
export function todaySchedule(
  events: readonly CalendarEvent[],
  now: Date,
  timezone: string
): EventView[] {
  const timed = eventsOnDay(events, now, timezone)
    .filter((event) => !event.isAllDay)
    .sort(byStart);
  return timed.map((event) => toView(event, now, timed));
}

/**
 * Turn a drop position into a start time: the day column plus the minutes
 * below the grid's first hour, snapped to the grid step.
 * Returns null for positions outside the week's columns.
 */
export function dropSlotToStart(
  window: WeekWindow,
  dayIndex: number,
  minutesFromGridStart: number,
  grid: GridGeometry
): Date | null {
  if (!Number.isInteger(dayIndex) || dayIndex < 0 || dayIndex >= DAYS_PER_WEEK) {
    return null;
  }
  if (!Number.isFinite(minutesFromGridStart)) {
    return null;
  }

  const snapped = Math.round(Math.max(0, minutesFromGridStart) / grid.snapMinutes) * grid.snapMinutes;
  return inZone(window.start, window.timezone)
    .plus({ days: dayIndex })
    .set({ hour: grid.startHour, minute: 0, second: 0, millisecond: 0 })
    .plus({ minutes: snapped })
    .toJSDate();
}
