/**
 * @fileoverview Server entry point for the agenda planner.
 *
 * Validates configuration, loads the current week from the calendar and
 * serves the JSON API on localhost.
 */

import config, { validateConfig } from './config.js';
import { createApp } from './app.js';
import { getAgendaSession, getNoticeBoard } from './services/agenda/index.js';
import { createLogger, initObservability } from './utils/observability/index.js';
import { withErrorContext } from './utils/errors.js';

// Fail fast if critical configuration is missing
validateConfig();
initObservability();

const log = createLogger({ domain: 'server' });

const session = getAgendaSession();
const app = createApp({ session, notices: getNoticeBoard() });

const server = app.listen(config.port, () => {
  log.info('server_started', {
    port: config.port,
    env: config.nodeEnv,
    timezone: config.schedule.timezone,
    calendarProvider: config.calendar.provider,
    taskProvider: config.tasks.provider,
  });

  // A failed first load is reported by the session; the API stays up.
  withErrorContext(() => session.refresh(), 'initial_week_load').catch((error: unknown) => {
    log.error('initial_week_load_threw', { error });
  });
});

let isShuttingDown = false;

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  log.info('shutdown_signal_received', { signal });

  // Let background task mirroring finish before closing
  await session.settle();

  const forceExitTimer = setTimeout(() => {
    log.warn('force_exit_after_timeout');
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    log.info('server_closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
