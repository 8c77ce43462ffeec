export {
  createWeekWindow,
  shiftWeek,
  goToToday,
  containsDate,
  isCurrentWeek,
  eventsOnDay,
  eventStatus,
  projectWeek,
  todaySchedule,
  dropSlotToStart,
} from './view.js';

export type {
  WeekWindow,
  EventStatus,
  EventView,
  DayColumn,
  WeekProjection,
  GridGeometry,
} from './view.js';
