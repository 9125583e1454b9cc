/**
 * Calendar enumerations and rendering of decomposed calendar fields
 */

import { InvalidEnumerationMappingError } from '@fractime/utils';
import type { CalendarFields } from '../ports/calendarPort.js';

/** Month of the year. */
export enum Month {
  January = 1,
  February = 2,
  March = 3,
  April = 4,
  May = 5,
  June = 6,
  July = 7,
  August = 8,
  September = 9,
  October = 10,
  November = 11,
  December = 12,
}

/** Day of the week, Sunday first. */
export enum DayOfWeek {
  Sunday = 0,
  Monday = 1,
  Tuesday = 2,
  Wednesday = 3,
  Thursday = 4,
  Friday = 5,
  Saturday = 6,
}

export function monthFromNumber(value: number): Month {
  switch (value) {
    case 1:
      return Month.January;
    case 2:
      return Month.February;
    case 3:
      return Month.March;
    case 4:
      return Month.April;
    case 5:
      return Month.May;
    case 6:
      return Month.June;
    case 7:
      return Month.July;
    case 8:
      return Month.August;
    case 9:
      return Month.September;
    case 10:
      return Month.October;
    case 11:
      return Month.November;
    case 12:
      return Month.December;
    default:
      throw new InvalidEnumerationMappingError('month', value);
  }
}

export function dayOfWeekFromNumber(value: number): DayOfWeek {
  switch (value) {
    case 0:
      return DayOfWeek.Sunday;
    case 1:
      return DayOfWeek.Monday;
    case 2:
      return DayOfWeek.Tuesday;
    case 3:
      return DayOfWeek.Wednesday;
    case 4:
      return DayOfWeek.Thursday;
    case 5:
      return DayOfWeek.Friday;
    case 6:
      return DayOfWeek.Saturday;
    default:
      throw new InvalidEnumerationMappingError('weekday', value);
  }
}

const NANOS_PER_SECOND = 1_000_000_000;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function formatYear(year: number): string {
  if (year >= 0 && year <= 9999) {
    return pad(year, 4);
  }
  return `${year < 0 ? '-' : '+'}${pad(Math.abs(year), 4)}`;
}

// Shortest of 3, 6 or 9 digits that is exact
function formatFraction(nanos: number): string {
  if (nanos === 0) {
    return '';
  }
  if (nanos % 1_000_000 === 0) {
    return `.${pad(nanos / 1_000_000, 3)}`;
  }
  if (nanos % 1_000 === 0) {
    return `.${pad(nanos / 1_000, 6)}`;
  }
  return `.${pad(nanos, 9)}`;
}

/**
 * `YYYY-MM-DD HH:MM:SS[.fff[fff[fff]]]`. A leap-second nanosecond value
 * (>= 1e9) renders as second 60.
 */
export function formatCalendarFields(fields: CalendarFields): string {
  const month = monthFromNumber(fields.month);
  const leap = fields.nanosecond >= NANOS_PER_SECOND;
  const second = leap ? fields.second + 1 : fields.second;
  const nanos = leap ? fields.nanosecond - NANOS_PER_SECOND : fields.nanosecond;

  return (
    `${formatYear(fields.year)}-${pad(month, 2)}-${pad(fields.day, 2)} ` +
    `${pad(fields.hour, 2)}:${pad(fields.minute, 2)}:${pad(second, 2)}${formatFraction(nanos)}`
  );
}
