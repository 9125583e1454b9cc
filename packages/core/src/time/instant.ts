/**
 * Instant
 *
 * An immutable UTC point in time at nanosecond resolution. Every instant
 * carries the calendar it was built with; calendar fields, rendering and
 * offsets all go through that port.
 */

import { ValidationError, createLogger } from '@fractime/utils';
import type {
  CalendarFields,
  CalendarPort,
  CivilDateTime,
  UtcReading,
} from '../ports/calendarPort.js';
import {
  DayOfWeek,
  Month,
  dayOfWeekFromNumber,
  formatCalendarFields,
  monthFromNumber,
} from './calendar.js';
import type { RationalDuration } from './duration.js';
import { elapsedUnits } from './elapsed.js';

const log = createLogger('@fractime/core');

const NANOS_PER_SECOND = 1_000_000_000n;
const MAX_NANOSECOND = 1_999_999_999;

/**
 * Signed difference between two instants. `nanoseconds` has the sign of
 * `seconds` (or is zero) and magnitude below one second.
 */
export interface TimeSpan {
  readonly seconds: bigint;
  readonly nanoseconds: bigint;
}

export class Instant {
  private constructor(
    private readonly reading: UtcReading,
    private readonly calendar: CalendarPort
  ) {}

  /**
   * Capture the calendar's current UTC reading.
   */
  static now(calendar: CalendarPort): Instant {
    return Instant.fromReading(calendar, calendar.nowUtc());
  }

  /**
   * Fields are already UTC. Returns null when they do not form a valid date.
   */
  static fromUtc(calendar: CalendarPort, fields: CivilDateTime): Instant | null {
    return Instant.compose(calendar, fields, 'utc');
  }

  /**
   * Fields are wall-clock time in the calendar's host zone.
   * Returns null when they do not form a valid date.
   */
  static fromLocal(calendar: CalendarPort, fields: CivilDateTime): Instant | null {
    return Instant.compose(calendar, fields, 'local');
  }

  static fromReading(calendar: CalendarPort, reading: UtcReading): Instant {
    if (
      !Number.isInteger(reading.nanosecond) ||
      reading.nanosecond < 0 ||
      reading.nanosecond > MAX_NANOSECOND
    ) {
      throw new ValidationError('nanosecond must be an integer in 0..1999999999', {
        nanosecond: reading.nanosecond,
      });
    }
    return new Instant(
      { epochSeconds: reading.epochSeconds, nanosecond: reading.nanosecond },
      calendar
    );
  }

  private static compose(
    calendar: CalendarPort,
    fields: CivilDateTime,
    mode: 'utc' | 'local'
  ): Instant | null {
    const result = mode === 'utc' ? calendar.composeUtc(fields) : calendar.composeLocal(fields);
    if (!result.ok) {
      log.debug('Rejected calendar date', { ...fields, mode, reason: result.reason });
      return null;
    }
    return Instant.fromReading(calendar, result.reading);
  }

  private fields(): CalendarFields {
    return this.calendar.decomposeUtc(this.reading);
  }

  year(): number {
    return this.fields().year;
  }

  month(): Month {
    return monthFromNumber(this.fields().month);
  }

  day(): number {
    return this.fields().day;
  }

  dayOfWeek(): DayOfWeek {
    return dayOfWeekFromNumber(this.fields().weekday);
  }

  /** 0-23 */
  hour(): number {
    return this.fields().hour;
  }

  /** 0-59 */
  minute(): number {
    return this.fields().minute;
  }

  /** 0-59 */
  second(): number {
    return this.fields().second;
  }

  /** 0-1,999,999,999; values from 1e9 encode a leap second. */
  nanosecond(): number {
    return this.fields().nanosecond;
  }

  /**
   * `this - other` as whole seconds plus a same-signed nanosecond remainder.
   */
  since(other: Instant): TimeSpan {
    const total =
      (this.reading.epochSeconds - other.reading.epochSeconds) * NANOS_PER_SECOND +
      BigInt(this.reading.nanosecond - other.reading.nanosecond);
    return {
      seconds: total / NANOS_PER_SECOND,
      nanoseconds: total % NANOS_PER_SECOND,
    };
  }

  /**
   * Whole `unit`-sized intervals from `baseline` to this instant.
   *
   * ```ts
   * const start = Instant.now(calendar);
   * const thirds = Instant.now(calendar).elapsedUnits(start, SECOND.divideByInteger(3));
   * ```
   */
  elapsedUnits(baseline: Instant, unit: RationalDuration): bigint {
    return elapsedUnits(this, baseline, unit);
  }

  /**
   * Raw UTC rendering.
   */
  toDebugString(): string {
    return formatCalendarFields(this.fields());
  }

  /**
   * Rendering in the calendar's host zone.
   */
  toString(): string {
    const offset = this.calendar.localOffsetSeconds(this.reading);
    const shifted: UtcReading = {
      epochSeconds: this.reading.epochSeconds + BigInt(offset),
      nanosecond: this.reading.nanosecond,
    };
    return formatCalendarFields(this.calendar.decomposeUtc(shifted));
  }

  toJSON(): string {
    return this.toDebugString();
  }
}
