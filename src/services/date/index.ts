export {
  WEEKDAY_MAP,
  DAY_REF_SOURCE,
  parseDayRef,
  localDay,
  resolveDayRef,
  atLocalTime,
  isValidTimezone,
  getTimezoneOffsetMinutes,
  formatInTimezone,
} from './resolver.js';

export type { DayRef } from './resolver.js';
