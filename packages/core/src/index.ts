/**
 * @fractime/core
 *
 * Exact time quantities and UTC instants: rational durations, calendar
 * decomposition and whole-unit elapsed counts.
 */

export {
  RationalDuration,
  RationalDurationSchema,
  parseRationalDuration,
  NANOSECOND,
  MICROSECOND,
  MILLISECOND,
  SECOND,
  MINUTE,
  HOUR,
  DAY,
} from './time/duration.js';
export type { IntegerLike, NamedUnit } from './time/duration.js';

export {
  Month,
  DayOfWeek,
  monthFromNumber,
  dayOfWeekFromNumber,
  formatCalendarFields,
} from './time/calendar.js';

export { Instant } from './time/instant.js';
export type { TimeSpan } from './time/instant.js';
export { elapsedUnits } from './time/elapsed.js';

export type {
  CalendarPort,
  CalendarFields,
  CivilDateTime,
  CompositionResult,
  UtcReading,
} from './ports/calendarPort.js';
export {
  createLuxonCalendarAdapter,
  createSystemCalendar,
} from './adapters/calendarLuxonAdapter.js';
export type { LuxonCalendarOptions } from './adapters/calendarLuxonAdapter.js';
