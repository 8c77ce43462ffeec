/**
 * Unit tests for the event resolver.
 */

import { describe, it, expect } from 'vitest';
import {
  findOverlaps,
  resolveEvent,
  moveEvent,
  resizeEvent,
  toSchedule,
} from '../../../src/services/schedule/resolver.js';
import type { CalendarEvent } from '../../../src/services/schedule/types.js';
import { iso, unwrap, unwrapError } from '../../helpers/result.js';

function event(id: string, start: string, end: string, isAllDay = false): CalendarEvent {
  return {
    id,
    title: `Event ${id}`,
    start: new Date(start),
    end: new Date(end),
    isAllDay,
    source: 'calendar',
  };
}

const standup = event('standup', '2024-01-05T09:00:00Z', '2024-01-05T09:30:00Z');
const review = event('review', '2024-01-05T14:00:00Z', '2024-01-05T14:45:00Z');
const holiday = event('holiday', '2024-01-05T00:00:00Z', '2024-01-06T00:00:00Z', true);
const sameDay = [standup, review, holiday];

describe('findOverlaps', () => {
  it('finds intersecting timed events', () => {
    const candidate = { start: new Date('2024-01-05T09:15:00Z'), end: new Date('2024-01-05T14:30:00Z'), isAllDay: false };
    expect(findOverlaps(candidate, sameDay)).toEqual(['standup', 'review']);
  });

  it('treats spans as half-open so adjacent events do not overlap', () => {
    const candidate = { start: new Date('2024-01-05T09:30:00Z'), end: new Date('2024-01-05T10:00:00Z'), isAllDay: false };
    expect(findOverlaps(candidate, sameDay)).toEqual([]);
  });

  it('never reports all-day events', () => {
    const allDay = { start: new Date('2024-01-05T00:00:00Z'), end: new Date('2024-01-06T00:00:00Z'), isAllDay: true };
    expect(findOverlaps(allDay, sameDay)).toEqual([]);
  });

  it('skips the event being edited', () => {
    expect(findOverlaps(review, sameDay, 'review')).toEqual([]);
  });
});

describe('resolveEvent', () => {
  const schedule = {
    start: new Date('2024-01-05T09:00:00Z'),
    end: new Date('2024-01-05T10:00:00Z'),
    isAllDay: false,
  };

  it('produces a pending event with overlaps and a trimmed title', () => {
    const pending = unwrap(resolveEvent(schedule, '  Write report ', sameDay));
    expect(pending).toEqual({
      title: 'Write report',
      start: schedule.start,
      end: schedule.end,
      isAllDay: false,
      source: 'calendar',
      overlaps: ['standup'],
    });
    expect(pending.id).toBeUndefined();
  });

  it('carries the requested source', () => {
    expect(unwrap(resolveEvent(schedule, 'Gym', [], 'task-list')).source).toBe('task-list');
  });

  it('requires a title', () => {
    const error = unwrapError(resolveEvent(schedule, '   ', sameDay));
    expect(error.kind).toBe('MissingTitle');
    expect(error.message).toBe('Please enter a task name');
  });

  it('rejects an empty span', () => {
    const error = unwrapError(resolveEvent({ ...schedule, end: schedule.start }, 'Gym', []));
    expect(error.kind).toBe('InvalidDuration');
  });
});

describe('moveEvent', () => {
  it('keeps the duration', () => {
    const pending = unwrap(moveEvent(review, new Date('2024-01-05T16:00:00Z'), sameDay));
    expect(pending.id).toBe('review');
    expect(iso(pending.start)).toBe('2024-01-05T16:00:00.000Z');
    expect(iso(pending.end)).toBe('2024-01-05T16:45:00.000Z');
    expect(pending.overlaps).toEqual([]);
  });

  it('reports overlaps at the new position but never with itself', () => {
    const pending = unwrap(moveEvent(review, new Date('2024-01-05T09:10:00Z'), sameDay));
    expect(pending.overlaps).toEqual(['standup']);
  });

  it('rejects an invalid start', () => {
    expect(unwrapError(moveEvent(review, new Date('nope'), sameDay)).kind).toBe('InvalidDuration');
  });
});

describe('resizeEvent', () => {
  it('moves the end edge', () => {
    const pending = unwrap(resizeEvent(review, { end: new Date('2024-01-05T15:30:00Z') }, sameDay));
    expect(iso(pending.start)).toBe('2024-01-05T14:00:00.000Z');
    expect(iso(pending.end)).toBe('2024-01-05T15:30:00.000Z');
  });

  it('moves the start edge', () => {
    const pending = unwrap(resizeEvent(review, { start: new Date('2024-01-05T09:15:00Z') }, sameDay));
    expect(iso(pending.start)).toBe('2024-01-05T09:15:00.000Z');
    expect(pending.overlaps).toEqual(['standup']);
  });

  it('rejects an end at or before the start and leaves the event unchanged', () => {
    const error = unwrapError(resizeEvent(review, { end: new Date('2024-01-05T13:00:00Z') }, sameDay));
    expect(error.kind).toBe('InvalidDuration');
    expect(iso(review.start)).toBe('2024-01-05T14:00:00.000Z');
    expect(iso(review.end)).toBe('2024-01-05T14:45:00.000Z');
  });
});

describe('toSchedule', () => {
  it('drops everything but the span', () => {
    const pending = unwrap(moveEvent(review, new Date('2024-01-05T16:00:00Z'), sameDay));
    expect(toSchedule(pending)).toEqual({ start: pending.start, end: pending.end, isAllDay: false });
  });
});
