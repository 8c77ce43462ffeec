/**
 * Integration tests for the JSON API.
 *
 * Drives the Express app through supertest over in-memory stores.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import request from 'supertest';
import { createTestApp, type TestApp } from '../helpers/app.js';
import { StoreError } from '../../src/utils/errors.js';
import type { CalendarEvent } from '../../src/services/schedule/types.js';

const SEED: CalendarEvent[] = [
  {
    id: 'standup',
    title: 'Standup',
    start: new Date('2024-01-03T09:00:00Z'),
    end: new Date('2024-01-03T09:30:00Z'),
    isAllDay: false,
    source: 'calendar',
  },
  {
    id: 'review',
    title: 'Review',
    start: new Date('2024-01-03T14:00:00Z'),
    end: new Date('2024-01-03T14:45:00Z'),
    isAllDay: false,
    source: 'calendar',
  },
  {
    id: 'offsite',
    title: 'Offsite',
    start: new Date('2024-01-05T00:00:00Z'),
    end: new Date('2024-01-06T00:00:00Z'),
    isAllDay: true,
    source: 'calendar',
  },
];

interface IdOnly {
  id: string;
}

function ids(events: IdOnly[]): string[] {
  return events.map((event) => event.id);
}

describe('API', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = createTestApp({ seed: SEED });
    await t.session.refresh();
  });

  describe('GET /health', () => {
    it('returns ok with a request id header', async () => {
      const response = await request(t.app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('ok');
      expect(response.headers['x-request-id']).toMatch(/^req_[0-9a-f]{12}$/);
    });

    it('echoes a client request id', async () => {
      const response = await request(t.app).get('/health').set('X-Request-Id', 'client-1');

      expect(response.headers['x-request-id']).toBe('client-1');
    });
  });

  describe('GET /api/presets', () => {
    it('lists quick and duration presets', async () => {
      const response = await request(t.app).get('/api/presets');

      expect(response.status).toBe(200);
      expect(response.body.quick).toEqual([
        { id: 'in-30-min', label: 'In 30 min' },
        { id: 'in-1-hour', label: 'In 1 hour' },
        { id: 'tomorrow-9am', label: 'Tomorrow 9am' },
        { id: 'next-monday-9am', label: 'Next Monday' },
      ]);
      expect(response.body.durations.map((d: { minutes: number }) => d.minutes)).toEqual([30, 60, 90, 120, 180]);
    });
  });

  describe('POST /api/parse', () => {
    it('returns inline feedback for text', async () => {
      const response = await request(t.app).post('/api/parse').send({ text: 'tomorrow 2pm' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        ok: true,
        label: 'Thursday, January 04 at 02:00 PM',
        schedule: {
          start: '2024-01-04T14:00:00.000Z',
          end: '2024-01-04T14:30:00.000Z',
          isAllDay: false,
        },
        durationMinutes: 30,
      });
    });

    it('returns inline feedback for a preset', async () => {
      const response = await request(t.app).post('/api/parse').send({ preset: 'in-30-min' });

      expect(response.status).toBe(200);
      expect(response.body.label).toBe('Wednesday, January 03 at 12:30 PM');
    });

    it('returns 422 with the parse error', async () => {
      const response = await request(t.app).post('/api/parse').send({ text: 'banana' });

      expect(response.status).toBe(422);
      expect(response.body).toEqual({
        success: false,
        error: { kind: 'Unparseable', message: 'Could not parse time' },
      });
    });

    it('returns 422 for an offset too far out to represent', async () => {
      const response = await request(t.app).post('/api/parse').send({ text: 'in 99999999999 weeks' });

      expect(response.status).toBe(422);
      expect(response.body.error.kind).toBe('UnrecognizedTime');
    });

    it('returns 400 without text or preset', async () => {
      const response = await request(t.app).post('/api/parse').send({});

      expect(response.status).toBe(400);
      expect(response.body.error).toEqual({ kind: 'BadRequest', message: 'Provide text or preset' });
    });

    it('returns 400 for an unknown preset', async () => {
      const response = await request(t.app).post('/api/parse').send({ preset: 'someday' });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('Unknown preset: "someday"');
    });
  });

  describe('week navigation', () => {
    it('projects the displayed week', async () => {
      const response = await request(t.app).get('/api/week');

      expect(response.status).toBe(200);
      const { week } = response.body;
      expect(week.label).toBe('January 1 — January 7');
      expect(week.isCurrentWeek).toBe(true);
      expect(ids(week.days[2].timed)).toEqual(['standup', 'review']);
      expect(ids(week.days[4].allDay)).toEqual(['offsite']);
    });

    it('moves forward and back to today', async () => {
      const next = await request(t.app).post('/api/week/next');
      expect(next.status).toBe(200);
      expect(next.body.week.label).toBe('January 8 — January 14');
      expect(next.body.week.weekOffset).toBe(1);

      const today = await request(t.app).post('/api/week/today');
      expect(today.body.week.weekOffset).toBe(0);
      expect(ids(today.body.week.days[2].timed)).toEqual(['standup', 'review']);
    });

    it('returns 502 when the calendar cannot be loaded', async () => {
      vi.spyOn(t.store, 'listEvents').mockRejectedValueOnce(new StoreError('Unreachable', 'offline'));

      const response = await request(t.app).get('/api/week');

      expect(response.status).toBe(502);
      expect(response.body.error).toEqual({ kind: 'Unreachable', message: 'offline' });
    });
  });

  describe('GET /api/today', () => {
    it('lists today\'s timed events with status', async () => {
      const response = await request(t.app).get('/api/today');

      expect(response.status).toBe(200);
      expect(response.body.events.map((e: { id: string; status: string }) => [e.id, e.status])).toEqual([
        ['standup', 'completed'],
        ['review', 'upcoming'],
      ]);
    });
  });

  describe('POST /api/tasks', () => {
    it('creates an event and mirrors it to the task list', async () => {
      const response = await request(t.app)
        .post('/api/tasks')
        .send({ title: 'Write report', when: 'today 2:30pm' });

      expect(response.status).toBe(201);
      expect(response.body.success).toBe(true);
      expect(response.body.overlaps).toEqual(['review']);
      expect(response.body.event).toMatchObject({
        title: 'Write report',
        start: '2024-01-03T14:30:00.000Z',
        end: '2024-01-03T15:00:00.000Z',
        isAllDay: false,
        source: 'task-list',
      });

      await t.session.settle();
      expect(t.tasks.list()).toEqual([{ title: 'Write report', dueTime: new Date('2024-01-03T14:30:00Z') }]);
      expect(t.store.all()).toHaveLength(4);
    });

    it('accepts a preset with a duration and no mirroring', async () => {
      const response = await request(t.app)
        .post('/api/tasks')
        .send({ title: 'Plan', preset: 'tomorrow-9am', durationMinutes: 90, mirrorToTasks: false });

      expect(response.status).toBe(201);
      expect(response.body.event.start).toBe('2024-01-04T09:00:00.000Z');
      expect(response.body.event.end).toBe('2024-01-04T10:30:00.000Z');
      expect(response.body.event.source).toBe('calendar');

      await t.session.settle();
      expect(t.tasks.list()).toEqual([]);
    });

    it('returns 400 for a malformed body', async () => {
      const noTitle = await request(t.app).post('/api/tasks').send({ when: 'tomorrow' });
      expect(noTitle.status).toBe(400);
      expect(noTitle.body.error.message).toBe('title must be a string');

      const noTime = await request(t.app).post('/api/tasks').send({ title: 'Gym' });
      expect(noTime.body.error.message).toBe('Provide either when or preset');

      const badPreset = await request(t.app).post('/api/tasks').send({ title: 'Gym', preset: 'someday' });
      expect(badPreset.body.error.message).toBe('Unknown preset: "someday"');

      const badDuration = await request(t.app)
        .post('/api/tasks')
        .send({ title: 'Gym', when: 'tomorrow 6pm', durationMinutes: '1h' });
      expect(badDuration.body.error.message).toBe('durationMinutes must be a number');
    });

    it('returns 422 for unparseable times and missing titles', async () => {
      const unparseable = await request(t.app).post('/api/tasks').send({ title: 'Gym', when: 'banana' });
      expect(unparseable.status).toBe(422);
      expect(unparseable.body.error).toEqual({ kind: 'Unparseable', message: 'Could not parse time' });

      const blank = await request(t.app).post('/api/tasks').send({ title: '   ', when: 'tomorrow 2pm' });
      expect(blank.status).toBe(422);
      expect(blank.body.error).toEqual({ kind: 'MissingTitle', message: 'Please enter a task name' });

      expect(t.store.all()).toHaveLength(3);
    });

    it('returns 502 when the calendar rejects the write', async () => {
      vi.spyOn(t.store, 'createEvent').mockRejectedValueOnce(new StoreError('Unreachable', 'offline'));

      const response = await request(t.app).post('/api/tasks').send({ title: 'Gym', when: 'tomorrow 6pm' });

      expect(response.status).toBe(502);
      expect(response.body.error.kind).toBe('Unreachable');
      expect(t.notices.recent().map((notice) => notice.message)).toEqual(['Failed to add task']);
    });
  });

  describe('POST /api/events/:id/move', () => {
    it('moves to an ISO start, keeping the duration', async () => {
      const response = await request(t.app)
        .post('/api/events/review/move')
        .send({ start: '2024-01-03T16:00:00Z' });

      expect(response.status).toBe(200);
      expect(response.body.event).toMatchObject({
        id: 'review',
        start: '2024-01-03T16:00:00.000Z',
        end: '2024-01-03T16:45:00.000Z',
      });
      expect(response.body.overlaps).toEqual([]);
    });

    it('moves to a grid slot and reports overlaps', async () => {
      // Wednesday column, 8 hours below a 6am grid start
      const response = await request(t.app)
        .post('/api/events/standup/move')
        .send({ dayIndex: 2, minutes: 480 });

      expect(response.status).toBe(200);
      expect(response.body.event.start).toBe('2024-01-03T14:00:00.000Z');
      expect(response.body.event.end).toBe('2024-01-03T14:30:00.000Z');
      expect(response.body.overlaps).toEqual(['review']);
    });

    it('returns 400 without a usable target', async () => {
      const response = await request(t.app).post('/api/events/review/move').send({ dayIndex: 9, minutes: 0 });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe(
        'Provide start as an ISO timestamp, or dayIndex and minutes inside the week grid'
      );
    });

    it('returns 404 for an unknown event', async () => {
      const response = await request(t.app)
        .post('/api/events/ghost/move')
        .send({ start: '2024-01-03T16:00:00Z' });

      expect(response.status).toBe(404);
      expect(response.body.error).toEqual({ kind: 'NotFound', message: 'Event ghost not found' });
    });
  });

  describe('POST /api/events/:id/resize', () => {
    it('moves the end edge', async () => {
      const response = await request(t.app)
        .post('/api/events/review/resize')
        .send({ end: '2024-01-03T15:30:00Z' });

      expect(response.status).toBe(200);
      expect(response.body.event.start).toBe('2024-01-03T14:00:00.000Z');
      expect(response.body.event.end).toBe('2024-01-03T15:30:00.000Z');
    });

    it('returns 422 for an end before the start', async () => {
      const response = await request(t.app)
        .post('/api/events/review/resize')
        .send({ end: '2024-01-03T13:00:00Z' });

      expect(response.status).toBe(422);
      expect(response.body.error.kind).toBe('InvalidDuration');
    });

    it('returns 400 without edges or with a bad date', async () => {
      const none = await request(t.app).post('/api/events/review/resize').send({});
      expect(none.status).toBe(400);
      expect(none.body.error.message).toBe('Provide start, end or both');

      const bad = await request(t.app).post('/api/events/review/resize').send({ end: 'later' });
      expect(bad.status).toBe(400);
      expect(bad.body.error.message).toBe('start and end must be ISO timestamps');
    });
  });

  describe('DELETE /api/events/:id', () => {
    it('deletes the event', async () => {
      const response = await request(t.app).delete('/api/events/standup');

      expect(response.status).toBe(204);
      const today = await request(t.app).get('/api/today');
      expect(ids(today.body.events)).toEqual(['review']);
      expect(ids(t.store.all())).not.toContain('standup');
    });

    it('returns 409 while the same event is still being saved', async () => {
      t = createTestApp({ seed: SEED, storeTimeoutMs: 5000 });
      await t.session.refresh();

      let rejectUpdate: (error: Error) => void = () => undefined;
      vi.spyOn(t.store, 'updateEvent').mockImplementationOnce(
        () =>
          new Promise<CalendarEvent>((_, reject) => {
            rejectUpdate = reject;
          })
      );
      const move = t.session.moveEvent('review', new Date('2024-01-03T16:00:00Z'));

      const response = await request(t.app).delete('/api/events/review');

      expect(response.status).toBe(409);
      expect(response.body.error).toEqual({ kind: 'EditInProgress', message: 'This event is still being saved' });

      // The failed move rolls back and the event can be edited again.
      rejectUpdate(new StoreError('Unreachable', 'offline'));
      const moved = await move;
      expect(moved.success).toBe(false);
      expect(t.session.isEditing('review')).toBe(false);
      expect(t.session.events().find((event) => event.id === 'review')?.start).toEqual(
        new Date('2024-01-03T14:00:00Z')
      );
    });
  });

  describe('GET /api/notices', () => {
    it('returns recent notices and filters by since', async () => {
      await request(t.app).post('/api/tasks').send({ title: 'Gym', when: 'tomorrow 6pm', mirrorToTasks: false });

      const all = await request(t.app).get('/api/notices');
      expect(all.status).toBe(200);
      expect(all.body.notices).toEqual([
        { level: 'info', message: 'Task added successfully', at: '2024-01-03T12:00:00.000Z' },
      ]);

      const newer = await request(t.app).get('/api/notices').query({ since: '2024-01-03T12:00:00Z' });
      expect(newer.body.notices).toEqual([]);
    });

    it('returns 400 for an invalid since', async () => {
      const response = await request(t.app).get('/api/notices').query({ since: 'yesterday' });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('since must be an ISO timestamp');
    });
  });

  describe('malformed JSON', () => {
    it('returns 400', async () => {
      const response = await request(t.app)
        .post('/api/tasks')
        .set('Content-Type', 'application/json')
        .send('{"title":');

      expect(response.status).toBe(400);
      expect(response.body.error).toEqual({ kind: 'BadRequest', message: 'Malformed JSON body' });
    });
  });
});
