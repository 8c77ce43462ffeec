/**
 * @fileoverview In-memory calendar store.
 *
 * Used when CALENDAR_STORE_PROVIDER=memory (offline use) and by tests.
 * Data is lost on process restart.
 */

import { randomUUID } from 'crypto';
import { StoreError } from '../../utils/errors.js';
import type { CalendarEvent, EventSource, ResolvedSchedule } from '../schedule/types.js';
import type { CalendarStore, DayRange } from './types.js';

function copy(event: CalendarEvent): CalendarEvent {
  return { ...event, start: new Date(event.start), end: new Date(event.end) };
}

export class MemoryCalendarStore implements CalendarStore {
  private events = new Map<string, CalendarEvent>();

  constructor(seed: CalendarEvent[] = []) {
    for (const event of seed) {
      this.events.set(event.id, copy(event));
    }
  }

  async listEvents(range: DayRange): Promise<CalendarEvent[]> {
    const start = range.start.getTime();
    const end = range.end.getTime();
    return [...this.events.values()]
      .filter((event) => event.start.getTime() >= start && event.start.getTime() < end)
      .sort((a, b) => a.start.getTime() - b.start.getTime())
      .map(copy);
  }

  async createEvent(
    schedule: ResolvedSchedule,
    title: string,
    source: EventSource = 'calendar'
  ): Promise<CalendarEvent> {
    const event: CalendarEvent = {
      id: randomUUID(),
      title,
      start: new Date(schedule.start),
      end: new Date(schedule.end),
      isAllDay: schedule.isAllDay,
      source,
    };
    this.events.set(event.id, event);
    return copy(event);
  }

  async updateEvent(id: string, schedule: ResolvedSchedule): Promise<CalendarEvent> {
    const existing = this.events.get(id);
    if (!existing) {
      throw new StoreError('NotFound', `Event ${id} not found`, { eventId: id });
    }
    const updated: CalendarEvent = {
      ...existing,
      start: new Date(schedule.start),
      end: new Date(schedule.end),
      isAllDay: schedule.isAllDay,
    };
    this.events.set(id, updated);
    return copy(updated);
  }

  async deleteEvent(id: string): Promise<void> {
    if (!this.events.delete(id)) {
      throw new StoreError('NotFound', `Event ${id} not found`, { eventId: id });
    }
  }

  /** Snapshot of every stored event. Useful for test assertions. */
  all(): CalendarEvent[] {
    return [...this.events.values()].map(copy);
  }

  /** Clear all events. Useful for test cleanup. */
  clear(): void {
    this.events.clear();
  }
}
