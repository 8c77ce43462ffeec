/**
 * @fileoverview Calendar store factory.
 *
 * Returns the configured calendar store.
 * Singleton pattern - returns the same instance on repeated calls.
 */

import config from '../../config.js';
import type { CalendarStore } from './types.js';
import { GoogleCalendarStore } from './google.js';
import { MemoryCalendarStore } from './memory.js';

export type { CalendarStore, DayRange } from './types.js';
export { GoogleCalendarStore, fromGoogleEvent } from './google.js';
export { toStoreError } from './errors.js';
export { MemoryCalendarStore } from './memory.js';

let instance: CalendarStore | null = null;

/**
 * Get the calendar store instance.
 *
 * Based on CALENDAR_STORE_PROVIDER:
 * - 'google': Google Calendar (default)
 * - 'memory': In-memory store (offline use and tests)
 */
export function getCalendarStore(): CalendarStore {
  if (instance) {
    return instance;
  }

  switch (config.calendar.provider) {
    case 'google': {
      const { clientId, clientSecret, refreshToken, redirectUri } = config.google;
      if (!clientId || !clientSecret || !refreshToken) {
        throw new Error(
          'GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REFRESH_TOKEN are required for the google calendar store'
        );
      }
      instance = new GoogleCalendarStore({
        clientId,
        clientSecret,
        refreshToken,
        redirectUri,
        calendarId: config.calendar.calendarId,
        timezone: config.schedule.timezone,
      });
      break;
    }
    case 'memory':
      instance = new MemoryCalendarStore();
      break;
    default:
      throw new Error(
        `Invalid CALENDAR_STORE_PROVIDER: ${config.calendar.provider}. Expected 'google' or 'memory'.`
      );
  }

  return instance;
}

/**
 * Reset the calendar store instance.
 * Useful for tests to get a fresh store.
 */
export function resetCalendarStore(): void {
  instance = null;
}
