/**
 * Unit tests for quick-time and duration presets.
 */

import { describe, it, expect } from 'vitest';
import {
  QUICK_PRESETS,
  DURATION_PRESETS,
  findPreset,
  resolveFromPreset,
} from '../../../src/services/schedule/presets.js';
import { AppError } from '../../../src/utils/errors.js';
import { iso } from '../../helpers/result.js';

const UTC = { timezone: 'UTC', defaultDurationMinutes: 30 };

describe('resolveFromPreset', () => {
  it('offsets "in-30-min" from now with a 30 minute span', () => {
    const schedule = resolveFromPreset('in-30-min', new Date('2024-01-01T10:00:00Z'), UTC);
    expect(iso(schedule.start)).toBe('2024-01-01T10:30:00.000Z');
    expect(iso(schedule.end)).toBe('2024-01-01T11:00:00.000Z');
    expect(schedule.isAllDay).toBe(false);
  });

  it('offsets "in-1-hour" from now', () => {
    const schedule = resolveFromPreset('in-1-hour', new Date('2024-01-01T10:00:00Z'), UTC);
    expect(iso(schedule.start)).toBe('2024-01-01T11:00:00.000Z');
    expect(iso(schedule.end)).toBe('2024-01-01T11:30:00.000Z');
  });

  it('anchors "tomorrow-9am" to the next local day', () => {
    const schedule = resolveFromPreset('tomorrow-9am', new Date('2024-01-01T23:00:00Z'), UTC);
    expect(iso(schedule.start)).toBe('2024-01-02T09:00:00.000Z');
    expect(iso(schedule.end)).toBe('2024-01-02T09:30:00.000Z');
  });

  it('never resolves "next-monday-9am" to today', () => {
    // Monday
    const schedule = resolveFromPreset('next-monday-9am', new Date('2024-01-01T07:00:00Z'), UTC);
    expect(iso(schedule.start)).toBe('2024-01-08T09:00:00.000Z');
  });

  it('resolves "next-monday-9am" later in the week to the coming Monday', () => {
    const schedule = resolveFromPreset('next-monday-9am', new Date('2024-01-04T12:00:00Z'), UTC);
    expect(iso(schedule.start)).toBe('2024-01-08T09:00:00.000Z');
  });

  it('anchors in the configured timezone', () => {
    const schedule = resolveFromPreset('tomorrow-9am', new Date('2024-01-01T10:00:00Z'), {
      timezone: 'America/Los_Angeles',
    });
    expect(iso(schedule.start)).toBe('2024-01-02T17:00:00.000Z');
  });

  it('throws a non-recoverable AppError for unknown ids', () => {
    let thrown: unknown;
    try {
      resolveFromPreset('someday', new Date('2024-01-01T10:00:00Z'), UTC);
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(AppError);
    expect(thrown).toMatchObject({ code: 'UNKNOWN_PRESET', recoverable: false });
  });
});

describe('preset tables', () => {
  it('lists the quick presets in display order', () => {
    expect(QUICK_PRESETS.map((preset) => preset.id)).toEqual([
      'in-30-min',
      'in-1-hour',
      'tomorrow-9am',
      'next-monday-9am',
    ]);
  });

  it('lists the duration presets', () => {
    expect(DURATION_PRESETS.map((preset) => preset.minutes)).toEqual([30, 60, 90, 120, 180]);
  });

  it('finds presets by id', () => {
    expect(findPreset('tomorrow-9am')?.label).toBe('Tomorrow 9am');
    expect(findPreset('nope')).toBeUndefined();
  });
});
