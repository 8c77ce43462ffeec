/**
 * @fileoverview JSON API over one agenda session.
 *
 * Routes:
 * - GET    /api/presets            - Quick and duration presets
 * - POST   /api/parse              - Inline feedback for { text } or { preset }
 * - GET    /api/week               - Reload and project the displayed week
 * - POST   /api/week/next          - Show the following week
 * - POST   /api/week/previous      - Show the preceding week
 * - POST   /api/week/today         - Jump back to the current week
 * - GET    /api/today              - Today's timed events with status
 * - GET    /api/notices            - Recent notices (?since=ISO)
 * - POST   /api/tasks              - Add a task
 * - POST   /api/events/:id/move    - Move an event, keeping its duration
 * - POST   /api/events/:id/resize  - Move either edge of an event
 * - DELETE /api/events/:id         - Delete an event
 *
 * Errors are `{ success: false, error: { kind, message } }`: 400 for a
 * malformed body, 422 for input the parser or resolver refused, 404 for
 * unknown events, 409 while an edit of the same event is in flight and 502
 * when the calendar failed or timed out.
 */

import { Router, type Request, type Response } from 'express';
import { ResolverError, StoreError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';
import { QUICK_PRESETS, DURATION_PRESETS, findPreset } from '../services/schedule/index.js';
import type { AddTaskInput, AgendaSession, NoticeBoard, SessionError } from '../services/agenda/index.js';

const log = createLogger({ domain: 'api' });

// ---------------------------------------------------------------------------
// Body helpers
// ---------------------------------------------------------------------------

type Body = Record<string, unknown>;

function readBody(req: Request): Body {
  const body: unknown = req.body;
  return typeof body === 'object' && body !== null && !Array.isArray(body) ? { ...body } : {};
}

function optionalString(body: Body, key: string): string | undefined | null {
  const value = body[key];
  if (value === undefined) return undefined;
  return typeof value === 'string' ? value : null;
}

function optionalNumber(body: Body, key: string): number | undefined | null {
  const value = body[key];
  if (value === undefined) return undefined;
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function optionalBoolean(body: Body, key: string): boolean | undefined | null {
  const value = body[key];
  if (value === undefined) return undefined;
  return typeof value === 'boolean' ? value : null;
}

function optionalDate(body: Body, key: string): Date | undefined | null {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function badRequest(res: Response, message: string): void {
  res.status(400).json({ success: false, error: { kind: 'BadRequest', message } });
}

function statusFor(error: SessionError): number {
  if (error instanceof StoreError) {
    return error.kind === 'NotFound' ? 404 : 502;
  }
  if (error instanceof ResolverError && error.kind === 'EditInProgress') {
    return 409;
  }
  return 422;
}

function sendError(res: Response, error: SessionError): void {
  res.status(statusFor(error)).json({
    success: false,
    error: { kind: error.kind, message: error.message },
  });
}

function internalError(res: Response, operation: string, error: unknown): void {
  log.error('request_failed', { operation, error });
  res.status(500).json({ success: false, error: { kind: 'Internal', message: 'Something went wrong' } });
}

/** Parse the POST /api/tasks body, or return the 400 message. */
function toAddTaskInput(body: Body): AddTaskInput | string {
  const title = body.title;
  const when = optionalString(body, 'when');
  const preset = optionalString(body, 'preset');
  const durationMinutes = optionalNumber(body, 'durationMinutes');
  const mirrorToTasks = optionalBoolean(body, 'mirrorToTasks');

  if (typeof title !== 'string') return 'title must be a string';
  if (when === null) return 'when must be a string';
  if (preset === null) return 'preset must be a string';
  if (when === undefined && preset === undefined) return 'Provide either when or preset';
  if (preset !== undefined && !findPreset(preset)) return `Unknown preset: "${preset}"`;
  if (durationMinutes === null) return 'durationMinutes must be a number';
  if (mirrorToTasks === null) return 'mirrorToTasks must be a boolean';

  return { title, when, preset, durationMinutes, mirrorToTasks };
}

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

export function createApiRouter(session: AgendaSession, notices: NoticeBoard): Router {
  const router = Router();

  router.get('/api/presets', (_req: Request, res: Response) => {
    res.json({
      quick: QUICK_PRESETS.map(({ id, label }) => ({ id, label })),
      durations: DURATION_PRESETS,
    });
  });

  router.post('/api/parse', (req: Request, res: Response) => {
    const body = readBody(req);
    const text = optionalString(body, 'text');
    const preset = optionalString(body, 'preset');

    if (preset) {
      if (!findPreset(preset)) {
        badRequest(res, `Unknown preset: "${preset}"`);
        return;
      }
      res.json({ success: true, ...session.previewPreset(preset) });
      return;
    }
    if (typeof text !== 'string') {
      badRequest(res, 'Provide text or preset');
      return;
    }

    const feedback = session.preview(text);
    if (!feedback.ok) {
      res.status(422).json({ success: false, error: { kind: feedback.kind, message: feedback.message } });
      return;
    }
    res.json({ success: true, ...feedback });
  });

  router.get('/api/week', async (_req: Request, res: Response) => {
    try {
      const loaded = await session.refresh();
      if (!loaded.success) {
        sendError(res, loaded.error);
        return;
      }
      res.json({ week: session.projection() });
    } catch (error) {
      internalError(res, 'week', error);
    }
  });

  const navigation: Record<string, () => ReturnType<AgendaSession['refresh']>> = {
    next: () => session.navigateWeek(1),
    previous: () => session.navigateWeek(-1),
    today: () => session.goToToday(),
  };

  for (const [path, navigate] of Object.entries(navigation)) {
    router.post(`/api/week/${path}`, async (_req: Request, res: Response) => {
      try {
        const loaded = await navigate();
        if (!loaded.success) {
          sendError(res, loaded.error);
          return;
        }
        res.json({ week: session.projection() });
      } catch (error) {
        internalError(res, `week_${path}`, error);
      }
    });
  }

  router.get('/api/today', (_req: Request, res: Response) => {
    res.json({ events: session.today() });
  });

  router.get('/api/notices', (req: Request, res: Response) => {
    const raw = req.query.since;
    let since: Date | undefined;
    if (raw !== undefined) {
      since = typeof raw === 'string' ? new Date(raw) : undefined;
      if (!since || Number.isNaN(since.getTime())) {
        badRequest(res, 'since must be an ISO timestamp');
        return;
      }
    }
    res.json({ notices: notices.recent(since) });
  });

  router.post('/api/tasks', async (req: Request, res: Response) => {
    const input = toAddTaskInput(readBody(req));
    if (typeof input === 'string') {
      badRequest(res, input);
      return;
    }

    try {
      const added = await session.addTask(input);
      if (!added.success) {
        sendError(res, added.error);
        return;
      }
      res.status(201).json({ success: true, ...added.data });
    } catch (error) {
      internalError(res, 'add_task', error);
    }
  });

  router.post('/api/events/:id/move', async (req: Request<{ id: string }>, res: Response) => {
    const body = readBody(req);
    let start = optionalDate(body, 'start');
    const dayIndex = optionalNumber(body, 'dayIndex');
    const minutes = optionalNumber(body, 'minutes');

    // A drop on the week grid may send its slot instead of a timestamp.
    if (start === undefined && typeof dayIndex === 'number' && typeof minutes === 'number') {
      start = session.dropToStart(dayIndex, minutes);
    }
    if (!start) {
      badRequest(res, 'Provide start as an ISO timestamp, or dayIndex and minutes inside the week grid');
      return;
    }

    try {
      const moved = await session.moveEvent(req.params.id, start);
      if (!moved.success) {
        sendError(res, moved.error);
        return;
      }
      res.json({ success: true, ...moved.data });
    } catch (error) {
      internalError(res, 'move_event', error);
    }
  });

  router.post('/api/events/:id/resize', async (req: Request<{ id: string }>, res: Response) => {
    const body = readBody(req);
    const start = optionalDate(body, 'start');
    const end = optionalDate(body, 'end');

    if (start === null || end === null) {
      badRequest(res, 'start and end must be ISO timestamps');
      return;
    }
    if (!start && !end) {
      badRequest(res, 'Provide start, end or both');
      return;
    }

    try {
      const resized = await session.resizeEvent(req.params.id, { start, end });
      if (!resized.success) {
        sendError(res, resized.error);
        return;
      }
      res.json({ success: true, ...resized.data });
    } catch (error) {
      internalError(res, 'resize_event', error);
    }
  });

  router.delete('/api/events/:id', async (req: Request<{ id: string }>, res: Response) => {
    try {
      const deleted = await session.deleteEvent(req.params.id);
      if (!deleted.success) {
        sendError(res, deleted.error);
        return;
      }
      res.status(204).send();
    } catch (error) {
      internalError(res, 'delete_event', error);
    }
  });

  return router;
}
