import { describe, it, expect } from 'vitest';
import { InvalidEnumerationMappingError } from '@fractime/utils';
import {
  DayOfWeek,
  Month,
  dayOfWeekFromNumber,
  formatCalendarFields,
  monthFromNumber,
} from '../../src/time/calendar.js';
import type { CalendarFields } from '../../src/ports/calendarPort.js';

function fields(overrides: Partial<CalendarFields>): CalendarFields {
  return {
    year: 2024,
    month: 1,
    day: 1,
    hour: 0,
    minute: 0,
    second: 0,
    nanosecond: 0,
    weekday: 1,
    ...overrides,
  };
}

describe('monthFromNumber', () => {
  it('maps every month', () => {
    expect(monthFromNumber(1)).toBe(Month.January);
    expect(monthFromNumber(6)).toBe(Month.June);
    expect(monthFromNumber(12)).toBe(Month.December);
    for (let value = 1; value <= 12; value++) {
      expect(monthFromNumber(value)).toBe(value);
    }
  });

  it.each([0, 13, -1, 1.5, Number.NaN])('rejects %s', (value) => {
    expect(() => monthFromNumber(value)).toThrow(InvalidEnumerationMappingError);
  });

  it('marks the failure as a contract violation', () => {
    let caught: unknown;
    try {
      monthFromNumber(13);
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({
      code: 'INVALID_ENUMERATION_MAPPING',
      isOperational: false,
      context: { enumeration: 'month', value: 13 },
    });
  });
});

describe('dayOfWeekFromNumber', () => {
  it('maps Sunday through Saturday', () => {
    expect(dayOfWeekFromNumber(0)).toBe(DayOfWeek.Sunday);
    expect(dayOfWeekFromNumber(3)).toBe(DayOfWeek.Wednesday);
    expect(dayOfWeekFromNumber(6)).toBe(DayOfWeek.Saturday);
  });

  it.each([-1, 7, 2.5])('rejects %s', (value) => {
    expect(() => dayOfWeekFromNumber(value)).toThrow(InvalidEnumerationMappingError);
  });
});

describe('formatCalendarFields', () => {
  it('pads every field', () => {
    expect(formatCalendarFields(fields({ year: 987, month: 3, day: 4, hour: 5, minute: 6, second: 7 }))).toBe(
      '0987-03-04 05:06:07'
    );
  });

  it('uses the shortest exact fraction', () => {
    expect(formatCalendarFields(fields({ nanosecond: 250_000_000 }))).toBe('2024-01-01 00:00:00.250');
    expect(formatCalendarFields(fields({ nanosecond: 1_500_000 }))).toBe('2024-01-01 00:00:00.001500');
    expect(formatCalendarFields(fields({ nanosecond: 7 }))).toBe('2024-01-01 00:00:00.000000007');
  });

  it('signs years outside 0..9999', () => {
    expect(formatCalendarFields(fields({ year: -1 }))).toBe('-0001-01-01 00:00:00');
    expect(formatCalendarFields(fields({ year: 12345 }))).toBe('+12345-01-01 00:00:00');
  });

  it('rejects an out-of-range month', () => {
    expect(() => formatCalendarFields(fields({ month: 0 }))).toThrow(InvalidEnumerationMappingError);
  });
});
