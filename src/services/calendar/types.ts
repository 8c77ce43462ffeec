/**
 * @fileoverview Calendar store interface.
 *
 * The store owns events and assigns their ids. Implementations report
 * failures as StoreError so callers can roll back local edits uniformly.
 */

import type { CalendarEvent, EventSource, ResolvedSchedule } from '../schedule/types.js';

/** Half-open time range [start, end). */
export interface DayRange {
  start: Date;
  end: Date;
}

export interface CalendarStore {
  /** Events whose start falls in the range, ordered by start. */
  listEvents(range: DayRange): Promise<CalendarEvent[]>;

  /** Persist a new event; the returned event carries the store-assigned id. */
  createEvent(schedule: ResolvedSchedule, title: string, source?: EventSource): Promise<CalendarEvent>;

  /** Replace an event's span. @throws StoreError (NotFound) for unknown ids */
  updateEvent(id: string, schedule: ResolvedSchedule): Promise<CalendarEvent>;

  /** @throws StoreError (NotFound) for unknown ids */
  deleteEvent(id: string): Promise<void>;
}
