/**
 * Instant Tests
 * =============
 * Construction, calendar accessors and rendering against fixed zones.
 */

import { describe, it, expect } from 'vitest';
import { InvalidEnumerationMappingError, ValidationError } from '@fractime/utils';
import { Instant } from '../../src/time/instant.js';
import { DayOfWeek, Month } from '../../src/time/calendar.js';
import { NANOSECOND } from '../../src/time/duration.js';
import { createLuxonCalendarAdapter } from '../../src/adapters/calendarLuxonAdapter.js';
import type { CivilDateTime } from '../../src/ports/calendarPort.js';
import { createFakeCalendar } from '../helpers/createFakeCalendar.js';

const utc = createLuxonCalendarAdapter({ timeZone: 'utc' });
const newYork = createLuxonCalendarAdapter({ timeZone: 'America/New_York' });
const kolkata = createLuxonCalendarAdapter({ timeZone: 'Asia/Kolkata' });

function civil(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0
): CivilDateTime {
  return { year, month, day, hour, minute, second };
}

function mustUtc(fields: CivilDateTime): Instant {
  const instant = Instant.fromUtc(utc, fields);
  if (!instant) {
    throw new Error(`test fixture rejected: ${JSON.stringify(fields)}`);
  }
  return instant;
}

describe('Instant', () => {
  describe('fromUtc', () => {
    it('returns the fields it was built from', () => {
      const instant = mustUtc(civil(2024, 2, 29, 12, 34, 56));

      expect(instant.year()).toBe(2024);
      expect(instant.month()).toBe(Month.February);
      expect(instant.day()).toBe(29);
      expect(instant.hour()).toBe(12);
      expect(instant.minute()).toBe(34);
      expect(instant.second()).toBe(56);
      expect(instant.nanosecond()).toBe(0);
      expect(instant.dayOfWeek()).toBe(DayOfWeek.Thursday);
    });

    it('reports 2024-01-01 as a Monday', () => {
      expect(mustUtc(civil(2024, 1, 1)).dayOfWeek()).toBe(DayOfWeek.Monday);
    });

    it.each([
      ['month 13', civil(2024, 13, 1)],
      ['month 0', civil(2024, 0, 1)],
      ['day 32', civil(2024, 1, 32)],
      ['day 0', civil(2024, 1, 0)],
      ['February 30', civil(2024, 2, 30)],
      ['February 29 in a common year', civil(2023, 2, 29)],
      ['hour 24', civil(2024, 1, 1, 24)],
      ['minute 60', civil(2024, 1, 1, 0, 60)],
      ['second 60', civil(2024, 1, 1, 0, 0, 60)],
      ['fractional day', civil(2024, 1, 1.5)],
      ['negative hour', civil(2024, 1, 1, -1)],
    ])('rejects %s', (_label, fields) => {
      expect(Instant.fromUtc(utc, fields)).toBeNull();
    });

    it('does not roll hour 24 into the next day', () => {
      expect(Instant.fromUtc(utc, civil(2024, 12, 31, 24, 0, 0))).toBeNull();
      expect(Instant.fromUtc(utc, civil(2024, 1, 1, 23, 59, 59))?.day()).toBe(1);
    });
  });

  describe('fromLocal', () => {
    it('converts winter wall time in New York to UTC', () => {
      const instant = Instant.fromLocal(newYork, civil(2024, 1, 15, 12, 0, 0));

      expect(instant?.hour()).toBe(17);
      expect(instant?.toDebugString()).toBe('2024-01-15 17:00:00');
      expect(instant?.toString()).toBe('2024-01-15 12:00:00');
    });

    it('applies daylight saving time in summer', () => {
      const instant = Instant.fromLocal(newYork, civil(2024, 7, 4, 9, 30, 0));

      expect(instant?.toDebugString()).toBe('2024-07-04 13:30:00');
      expect(instant?.toString()).toBe('2024-07-04 09:30:00');
    });

    it('crosses a date boundary for zones ahead of UTC', () => {
      const instant = Instant.fromLocal(kolkata, civil(2024, 1, 1, 0, 0, 0));

      expect(instant?.year()).toBe(2023);
      expect(instant?.month()).toBe(Month.December);
      expect(instant?.day()).toBe(31);
      expect(instant?.hour()).toBe(18);
      expect(instant?.minute()).toBe(30);
      expect(instant?.dayOfWeek()).toBe(DayOfWeek.Sunday);
    });

    it('rejects invalid fields like fromUtc', () => {
      expect(Instant.fromLocal(newYork, civil(2024, 13, 1))).toBeNull();
      expect(Instant.fromLocal(newYork, civil(2024, 4, 31))).toBeNull();
      expect(Instant.fromLocal(newYork, civil(2024, 1, 1, 0, 0, 60))).toBeNull();
    });

    it('rejects a wall-clock time skipped by the spring DST change', () => {
      expect(Instant.fromLocal(newYork, civil(2024, 3, 10, 2, 30, 0))).toBeNull();
      expect(Instant.fromLocal(newYork, civil(2024, 3, 10, 3, 0, 0))?.toDebugString()).toBe(
        '2024-03-10 07:00:00'
      );
    });

    it('matches fromUtc when the zone is UTC', () => {
      const local = Instant.fromLocal(utc, civil(2024, 5, 6, 7, 8, 9));
      const fromUtc = mustUtc(civil(2024, 5, 6, 7, 8, 9));

      expect(local?.since(fromUtc)).toEqual({ seconds: 0n, nanoseconds: 0n });
    });
  });

  describe('now', () => {
    it('captures the calendar reading', () => {
      const calendar = createFakeCalendar({
        now: { epochSeconds: 1704067200n, nanosecond: 123_456_789 },
      });
      const instant = Instant.now(calendar);

      expect(instant.toDebugString()).toBe('2024-01-01 00:00:00.123456789');
      expect(instant.nanosecond()).toBe(123_456_789);
    });

    it('never runs backwards on the system calendar', () => {
      const start = Instant.now(utc);
      expect(Instant.now(utc).elapsedUnits(start, NANOSECOND)).toBeGreaterThanOrEqual(0n);
    });
  });

  describe('fromReading', () => {
    it('rejects nanoseconds outside 0..1999999999', () => {
      expect(() => Instant.fromReading(utc, { epochSeconds: 0n, nanosecond: 2_000_000_000 })).toThrow(
        ValidationError
      );
      expect(() => Instant.fromReading(utc, { epochSeconds: 0n, nanosecond: -1 })).toThrow(
        ValidationError
      );
      expect(() => Instant.fromReading(utc, { epochSeconds: 0n, nanosecond: 0.5 })).toThrow(
        ValidationError
      );
    });
  });

  describe('since', () => {
    it('splits the difference into seconds and a same-signed remainder', () => {
      const a = mustUtc(civil(2024, 1, 1));
      const b = Instant.fromReading(utc, { epochSeconds: 1704067201n, nanosecond: 500_000_000 });

      expect(b.since(a)).toEqual({ seconds: 1n, nanoseconds: 500_000_000n });
      expect(a.since(b)).toEqual({ seconds: -1n, nanoseconds: -500_000_000n });
    });

    it('borrows across the second boundary', () => {
      const a = Instant.fromReading(utc, { epochSeconds: 10n, nanosecond: 900_000_000 });
      const b = Instant.fromReading(utc, { epochSeconds: 12n, nanosecond: 100_000_000 });

      expect(b.since(a)).toEqual({ seconds: 1n, nanoseconds: 200_000_000n });
    });
  });

  describe('rendering', () => {
    it('renders whole seconds without a fraction', () => {
      expect(mustUtc(civil(2024, 1, 1)).toDebugString()).toBe('2024-01-01 00:00:00');
    });

    it('renders a leap second as second 60', () => {
      const leap = Instant.fromReading(utc, { epochSeconds: 1483228799n, nanosecond: 1_500_000_000 });

      expect(leap.second()).toBe(59);
      expect(leap.nanosecond()).toBe(1_500_000_000);
      expect(leap.toDebugString()).toBe('2016-12-31 23:59:60.500');
    });

    it('serializes to the UTC form', () => {
      expect(JSON.stringify({ at: mustUtc(civil(2024, 1, 1)) })).toBe('{"at":"2024-01-01 00:00:00"}');
    });
  });

  describe('calendar contract violations', () => {
    it('fails month decoding with a distinct error', () => {
      const calendar = createFakeCalendar({ overrides: { month: 13 } });
      const instant = Instant.fromUtc(calendar, civil(2024, 1, 1));

      expect(() => instant?.month()).toThrow(InvalidEnumerationMappingError);
      expect(() => instant?.toDebugString()).toThrow(InvalidEnumerationMappingError);
    });

    it('fails weekday decoding with a distinct error', () => {
      const calendar = createFakeCalendar({ overrides: { weekday: 7 } });
      const instant = Instant.fromUtc(calendar, civil(2024, 1, 1));

      expect(() => instant?.dayOfWeek()).toThrow(InvalidEnumerationMappingError);
    });
  });
});
