/**
 * @fileoverview Quick-time and duration presets.
 *
 * Presets are closed-set shortcuts: each one is a pure function of the
 * reference clock, so nothing here can fail on user input. An unknown id is a
 * programming error and throws.
 */

import { DateTime } from 'luxon';
import { atLocalTime, resolveDayRef, type DayRef } from '../date/index.js';
import { AppError } from '../../utils/errors.js';
import { normalizeSchedule } from './normalize.js';
import type { ResolvedSchedule, ScheduleDraft, ScheduleOptions } from './types.js';

type PresetRule =
  | { kind: 'offset'; minutes: number }
  | { kind: 'anchor'; day: DayRef; hour: number; minute: number };

export interface QuickPreset {
  id: string;
  label: string;
  durationMinutes: number;
  rule: PresetRule;
}

export const QUICK_PRESETS: readonly QuickPreset[] = [
  {
    id: 'in-30-min',
    label: 'In 30 min',
    durationMinutes: 30,
    rule: { kind: 'offset', minutes: 30 },
  },
  {
    id: 'in-1-hour',
    label: 'In 1 hour',
    durationMinutes: 30,
    rule: { kind: 'offset', minutes: 60 },
  },
  {
    id: 'tomorrow-9am',
    label: 'Tomorrow 9am',
    durationMinutes: 30,
    rule: { kind: 'anchor', day: { kind: 'tomorrow' }, hour: 9, minute: 0 },
  },
  {
    id: 'next-monday-9am',
    label: 'Next Monday',
    durationMinutes: 30,
    rule: { kind: 'anchor', day: { kind: 'weekday', weekday: 1, strict: true }, hour: 9, minute: 0 },
  },
];

export interface DurationPreset {
  label: string;
  minutes: number;
}

export const DURATION_PRESETS: readonly DurationPreset[] = [
  { label: '30m', minutes: 30 },
  { label: '1hr', minutes: 60 },
  { label: '1.5hr', minutes: 90 },
  { label: '2hr', minutes: 120 },
  { label: '3hr', minutes: 180 },
];

export function findPreset(presetId: string): QuickPreset | undefined {
  return QUICK_PRESETS.find((preset) => preset.id === presetId);
}

function presetStart(rule: PresetRule, referenceNow: Date, timezone: string): Date {
  if (rule.kind === 'offset') {
    return DateTime.fromJSDate(referenceNow, { zone: timezone }).plus({ minutes: rule.minutes }).toJSDate();
  }

  const day = resolveDayRef(rule.day, referenceNow, timezone);
  // A DST gap at the anchor time falls back to the shifted wall clock.
  const anchored = atLocalTime(day, rule.hour, rule.minute) ?? day.set({ hour: rule.hour, minute: rule.minute });
  return anchored.toJSDate();
}

/**
 * Resolve a quick preset against the reference clock.
 *
 * @throws AppError (UNKNOWN_PRESET) for ids outside {@link QUICK_PRESETS}
 */
export function resolveFromPreset(
  presetId: string,
  referenceNow: Date,
  options: ScheduleOptions
): ResolvedSchedule {
  const preset = findPreset(presetId);
  if (!preset) {
    throw new AppError(`Unknown preset: "${presetId}"`, 'UNKNOWN_PRESET', false, { presetId });
  }

  const draft: ScheduleDraft = {
    start: presetStart(preset.rule, referenceNow, options.timezone),
    durationMinutes: preset.durationMinutes,
    isAllDay: false,
  };

  const normalized = normalizeSchedule(draft, options);
  if (!normalized.success) {
    throw new AppError(`Preset "${presetId}" produced an empty span`, 'INVALID_PRESET', false, { presetId });
  }
  return normalized.data;
}
