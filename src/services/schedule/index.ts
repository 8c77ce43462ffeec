export { parseTimeExpression, describeSchedule } from './parser.js';
export {
  QUICK_PRESETS,
  DURATION_PRESETS,
  findPreset,
  resolveFromPreset,
} from './presets.js';
export {
  findOverlaps,
  resolveEvent,
  moveEvent,
  resizeEvent,
  toSchedule,
} from './resolver.js';
export { normalizeSchedule, applyDuration, durationMinutes } from './normalize.js';
export { systemClock, DEFAULT_DURATION_MINUTES } from './types.js';

export type {
  TimeExpression,
  ScheduleDraft,
  ResolvedSchedule,
  EventSource,
  CalendarEvent,
  PendingEvent,
  ScheduleOptions,
  Clock,
} from './types.js';
export type { QuickPreset, DurationPreset } from './presets.js';
