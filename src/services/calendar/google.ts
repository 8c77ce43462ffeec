/**
 * @fileoverview Google Calendar store.
 *
 * Implements the CalendarStore contract on top of the Calendar v3 API.
 * The OAuth2 client is built from the configured client id/secret and a
 * refresh token; googleapis refreshes access tokens on its own.
 * API failures are mapped to StoreError by {@link toStoreError}.
 */

import { google, type calendar_v3 } from 'googleapis';
import { DateTime } from 'luxon';
import { StoreError } from '../../utils/errors.js';
import { toStoreError } from './errors.js';
import { createLogger } from '../../utils/observability/index.js';
import type { CalendarEvent, EventSource, ResolvedSchedule } from '../schedule/types.js';
import type { CalendarStore, DayRange } from './types.js';

const log = createLogger({ domain: 'google-calendar' });

/** Private extended property marking events that were mirrored to the task list. */
const SOURCE_PROPERTY = 'agendaSource';
const PAGE_SIZE = 250;

export interface GoogleCalendarOptions {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  refreshToken: string;
  calendarId: string;
  timezone: string;
}

function readTime(
  time: calendar_v3.Schema$EventDateTime | undefined,
  timezone: string
): { date: Date; isAllDay: boolean } | null {
  if (time?.dateTime) {
    const date = new Date(time.dateTime);
    return Number.isNaN(date.getTime()) ? null : { date, isAllDay: false };
  }
  if (time?.date) {
    const day = DateTime.fromISO(time.date, { zone: timezone });
    return day.isValid ? { date: day.toJSDate(), isAllDay: true } : null;
  }
  return null;
}

function writeTime(date: Date, isAllDay: boolean, timezone: string): calendar_v3.Schema$EventDateTime {
  if (isAllDay) {
    return { date: DateTime.fromJSDate(date, { zone: timezone }).toISODate() ?? undefined };
  }
  return { dateTime: date.toISOString(), timeZone: timezone };
}

/**
 * Convert an API event into our CalendarEvent.
 * Returns null for events without an id or usable times (cancelled instances).
 */
export function fromGoogleEvent(event: calendar_v3.Schema$Event, timezone: string): CalendarEvent | null {
  const start = readTime(event.start, timezone);
  const end = readTime(event.end, timezone);
  if (!event.id || !start || !end) {
    return null;
  }

  const source: EventSource =
    event.extendedProperties?.private?.[SOURCE_PROPERTY] === 'task-list' ? 'task-list' : 'calendar';

  return {
    id: event.id,
    title: event.summary || '(No title)',
    start: start.date,
    end: end.date,
    isAllDay: start.isAllDay,
    source,
  };
}

export class GoogleCalendarStore implements CalendarStore {
  private client: calendar_v3.Calendar | null = null;

  constructor(private readonly options: GoogleCalendarOptions) {}

  private calendar(): calendar_v3.Calendar {
    if (!this.client) {
      const auth = new google.auth.OAuth2(
        this.options.clientId,
        this.options.clientSecret,
        this.options.redirectUri
      );
      auth.setCredentials({ refresh_token: this.options.refreshToken });
      this.client = google.calendar({ version: 'v3', auth });
    }
    return this.client;
  }

  private toEvent(data: calendar_v3.Schema$Event, operation: string): CalendarEvent {
    const event = fromGoogleEvent(data, this.options.timezone);
    if (!event) {
      throw new StoreError('Rejected', `Calendar returned an unusable event from ${operation}`, { operation });
    }
    return event;
  }

  async listEvents(range: DayRange): Promise<CalendarEvent[]> {
    const events: CalendarEvent[] = [];
    let pageToken: string | undefined;

    try {
      do {
        const response = await this.calendar().events.list({
          calendarId: this.options.calendarId,
          timeMin: range.start.toISOString(),
          timeMax: range.end.toISOString(),
          singleEvents: true,
          orderBy: 'startTime',
          maxResults: PAGE_SIZE,
          pageToken,
        });

        for (const item of response.data.items ?? []) {
          const event = fromGoogleEvent(item, this.options.timezone);
          if (event && event.start >= range.start && event.start < range.end) {
            events.push(event);
          }
        }
        pageToken = response.data.nextPageToken ?? undefined;
      } while (pageToken);
    } catch (error) {
      const storeError = toStoreError(error, 'listEvents');
      log.warn('list_events_failed', { kind: storeError.kind, error: storeError.message });
      throw storeError;
    }

    log.debug('list_events_succeeded', { count: events.length });
    return events;
  }

  async createEvent(
    schedule: ResolvedSchedule,
    title: string,
    source: EventSource = 'calendar'
  ): Promise<CalendarEvent> {
    try {
      const response = await this.calendar().events.insert({
        calendarId: this.options.calendarId,
        requestBody: {
          summary: title,
          start: writeTime(schedule.start, schedule.isAllDay, this.options.timezone),
          end: writeTime(schedule.end, schedule.isAllDay, this.options.timezone),
          extendedProperties: { private: { [SOURCE_PROPERTY]: source } },
        },
      });
      const event = this.toEvent(response.data, 'createEvent');
      log.info('create_event_succeeded', { eventId: event.id, isAllDay: event.isAllDay });
      return event;
    } catch (error) {
      const storeError = toStoreError(error, 'createEvent');
      log.warn('create_event_failed', { kind: storeError.kind, error: storeError.message });
      throw storeError;
    }
  }

  async updateEvent(id: string, schedule: ResolvedSchedule): Promise<CalendarEvent> {
    try {
      const response = await this.calendar().events.patch({
        calendarId: this.options.calendarId,
        eventId: id,
        requestBody: {
          start: writeTime(schedule.start, schedule.isAllDay, this.options.timezone),
          end: writeTime(schedule.end, schedule.isAllDay, this.options.timezone),
        },
      });
      const event = this.toEvent(response.data, 'updateEvent');
      log.info('update_event_succeeded', { eventId: id });
      return event;
    } catch (error) {
      const storeError = toStoreError(error, 'updateEvent', id);
      log.warn('update_event_failed', { eventId: id, kind: storeError.kind, error: storeError.message });
      throw storeError;
    }
  }

  async deleteEvent(id: string): Promise<void> {
    try {
      await this.calendar().events.delete({
        calendarId: this.options.calendarId,
        eventId: id,
      });
      log.info('delete_event_succeeded', { eventId: id });
    } catch (error) {
      const storeError = toStoreError(error, 'deleteEvent', id);
      log.warn('delete_event_failed', { eventId: id, kind: storeError.kind, error: storeError.message });
      throw storeError;
    }
  }
}
