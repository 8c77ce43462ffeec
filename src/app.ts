/**
 * @fileoverview Express application factory.
 *
 * Kept separate from the entry point so tests can drive the app through
 * supertest without listening on a port.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { createApiRouter } from './routes/api.js';
import { createLogger, createRequestId, withLogContext } from './utils/observability/index.js';
import type { AgendaSession, NoticeBoard } from './services/agenda/index.js';

const log = createLogger({ domain: 'http' });

export interface AppDependencies {
  session: AgendaSession;
  notices: NoticeBoard;
}

export function createApp({ session, notices }: AppDependencies): express.Application {
  const app = express();

  app.use(express.json());

  // Every log line emitted while handling a request carries its id.
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = createRequestId(req.get('X-Request-Id'));
    res.setHeader('X-Request-Id', requestId);
    withLogContext({ requestId }, () => {
      log.debug('request_received', { method: req.method, path: req.path });
      next();
    });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  app.use(createApiRouter(session, notices));

  // Malformed JSON bodies and anything a handler let through.
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ success: false, error: { kind: 'BadRequest', message: 'Malformed JSON body' } });
      return;
    }
    log.error('unhandled_request_error', { error });
    res.status(500).json({ success: false, error: { kind: 'Internal', message: 'Something went wrong' } });
  });

  return app;
}
