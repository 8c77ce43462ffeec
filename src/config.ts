/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the application requires.
 *
 * @see .env.example for the full list of variables
 */

import 'dotenv/config';
import { isValidTimezone } from './services/date/resolver.js';

// ---------------------------------------------------------------------------
// Config helpers — make required vs optional intent explicit
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key] || undefined;
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

const CALENDAR_PROVIDERS: readonly string[] = ['google', 'memory'];
const TASK_PROVIDERS: readonly string[] = ['things', 'memory'];

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  port: optionalInt('PORT', 3000),
  nodeEnv: optional('NODE_ENV', 'development'),

  /** Scheduling behavior */
  schedule: {
    timezone: optional('AGENDA_TIMEZONE', 'America/Los_Angeles'),
    defaultDurationMinutes: optionalInt('DEFAULT_DURATION_MINUTES', 30),
    storeTimeoutMs: optionalInt('STORE_TIMEOUT_MS', 10000),
  },

  /** Week grid geometry used to turn drop positions into start times */
  grid: {
    startHour: optionalInt('GRID_START_HOUR', 6),
    snapMinutes: optionalInt('GRID_SNAP_MINUTES', 15),
  },

  /** Calendar storage */
  calendar: {
    provider: optional('CALENDAR_STORE_PROVIDER', 'google'),
    calendarId: optional('GOOGLE_CALENDAR_ID', 'primary'),
  },

  /** Google OAuth client used by the calendar store */
  google: {
    clientId: required('GOOGLE_CLIENT_ID'),
    clientSecret: required('GOOGLE_CLIENT_SECRET'),
    refreshToken: required('GOOGLE_REFRESH_TOKEN'),
    redirectUri: optional('GOOGLE_REDIRECT_URI', 'http://localhost:3000/auth/google/callback'),
  },

  /** Task list mirroring */
  tasks: {
    provider: optional('TASK_LIST_PROVIDER', 'things'),
    thingsAppName: optional('THINGS_APP_NAME', 'Things3'),
    thingsListName: optional('THINGS_LIST_NAME', 'Today'),
  },
};

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (!isValidTimezone(config.schedule.timezone)) {
    errors.push(`AGENDA_TIMEZONE must be an IANA timezone, got "${config.schedule.timezone}"`);
  }

  if (!CALENDAR_PROVIDERS.includes(config.calendar.provider)) {
    errors.push(`CALENDAR_STORE_PROVIDER must be 'google' or 'memory', got "${config.calendar.provider}"`);
  }
  if (!TASK_PROVIDERS.includes(config.tasks.provider)) {
    errors.push(`TASK_LIST_PROVIDER must be 'things' or 'memory', got "${config.tasks.provider}"`);
  }

  // Google OAuth (required only when Google is the store)
  if (config.calendar.provider === 'google') {
    if (!config.google.clientId) errors.push('GOOGLE_CLIENT_ID is required');
    if (!config.google.clientSecret) errors.push('GOOGLE_CLIENT_SECRET is required');
    if (!config.google.refreshToken) errors.push('GOOGLE_REFRESH_TOKEN is required');
  }

  // Numeric bounds
  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  if (!(config.schedule.defaultDurationMinutes >= 1)) {
    errors.push(`DEFAULT_DURATION_MINUTES must be >= 1, got ${config.schedule.defaultDurationMinutes}`);
  }
  if (!(config.schedule.storeTimeoutMs >= 100)) {
    errors.push(`STORE_TIMEOUT_MS must be >= 100, got ${config.schedule.storeTimeoutMs}`);
  }
  if (!(config.grid.startHour >= 0 && config.grid.startHour <= 23)) {
    errors.push(`GRID_START_HOUR must be 0-23, got ${config.grid.startHour}`);
  }
  if (!(config.grid.snapMinutes >= 1 && config.grid.snapMinutes <= 60)) {
    errors.push(`GRID_SNAP_MINUTES must be 1-60, got ${config.grid.snapMinutes}`);
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
