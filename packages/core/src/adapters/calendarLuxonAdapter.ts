/**
 * Luxon Calendar Adapter
 *
 * Implements CalendarPort on top of luxon. Luxon works in milliseconds, so
 * readings captured by `nowUtc()` have millisecond resolution; decomposition
 * passes the stored nanosecond field through untouched.
 */

import { DateTime } from 'luxon';
import { ConfigurationError, ValidationError, getTimeConfig } from '@fractime/utils';
import type {
  CalendarFields,
  CalendarPort,
  CivilDateTime,
  CompositionResult,
  UtcReading,
} from '../ports/calendarPort.js';

const NANOS_PER_SECOND = 1_000_000_000;
const NANOS_PER_MILLI = 1_000_000;

export interface LuxonCalendarOptions {
  /** IANA zone, `utc`, or `local` for the process zone. */
  timeZone?: string;
}

function readingFromMillis(millis: number): UtcReading {
  const seconds = Math.floor(millis / 1000);
  return {
    epochSeconds: BigInt(seconds),
    nanosecond: (millis - seconds * 1000) * NANOS_PER_MILLI,
  };
}

function millisFromReading(reading: UtcReading): number {
  const subSecond = reading.nanosecond % NANOS_PER_SECOND;
  return Number(reading.epochSeconds) * 1000 + Math.floor(subSecond / NANOS_PER_MILLI);
}

function toDateTime(reading: UtcReading, zone: string): DateTime {
  const dateTime = DateTime.fromMillis(millisFromReading(reading), { zone });
  if (!dateTime.isValid) {
    throw new ValidationError('Instant is outside the range the calendar can represent', {
      epochSeconds: reading.epochSeconds.toString(),
      reason: dateTime.invalidExplanation ?? dateTime.invalidReason,
    });
  }
  return dateTime;
}

function sameWallClock(dateTime: DateTime, fields: CivilDateTime): boolean {
  return (
    dateTime.year === fields.year &&
    dateTime.month === fields.month &&
    dateTime.day === fields.day &&
    dateTime.hour === fields.hour &&
    dateTime.minute === fields.minute &&
    dateTime.second === fields.second
  );
}

function formatCivil(fields: CivilDateTime): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${fields.year}-${pad(fields.month)}-${pad(fields.day)}T` +
    `${pad(fields.hour)}:${pad(fields.minute)}:${pad(fields.second)}`
  );
}

export function createLuxonCalendarAdapter(opts?: LuxonCalendarOptions): CalendarPort {
  const timeZone = opts?.timeZone ?? 'local';

  if (!DateTime.fromMillis(0, { zone: timeZone }).isValid) {
    throw new ConfigurationError(`Unsupported time zone: ${timeZone}`, 'FRACTIME_TIME_ZONE');
  }

  const compose = (fields: CivilDateTime, zone: string): CompositionResult => {
    const dateTime = DateTime.fromObject(
      {
        year: fields.year,
        month: fields.month,
        day: fields.day,
        hour: fields.hour,
        minute: fields.minute,
        second: fields.second,
        millisecond: 0,
      },
      { zone }
    );
    if (!dateTime.isValid) {
      return {
        ok: false,
        reason: dateTime.invalidExplanation ?? dateTime.invalidReason ?? 'invalid date',
      };
    }
    // luxon normalizes hour 24 into the next day and moves times in a DST gap
    // forward; either shows up as fields that differ from the input.
    if (!sameWallClock(dateTime, fields)) {
      return {
        ok: false,
        reason: `${formatCivil(fields)} does not exist in ${zone} (normalizes to ${formatCivil(dateTime)})`,
      };
    }
    return { ok: true, reading: readingFromMillis(dateTime.toMillis()) };
  };

  return {
    nowUtc(): UtcReading {
      return readingFromMillis(DateTime.utc().toMillis());
    },

    decomposeUtc(reading: UtcReading): CalendarFields {
      const dateTime = toDateTime(reading, 'utc');
      return {
        year: dateTime.year,
        month: dateTime.month,
        day: dateTime.day,
        hour: dateTime.hour,
        minute: dateTime.minute,
        second: dateTime.second,
        nanosecond: reading.nanosecond,
        // luxon: Monday = 1 ... Sunday = 7
        weekday: dateTime.weekday % 7,
      };
    },

    localOffsetSeconds(reading: UtcReading): number {
      return toDateTime(reading, timeZone).offset * 60;
    },

    composeUtc(fields: CivilDateTime): CompositionResult {
      return compose(fields, 'utc');
    },

    composeLocal(fields: CivilDateTime): CompositionResult {
      return compose(fields, timeZone);
    },
  };
}

/**
 * Calendar for composition roots, zoned by FRACTIME_TIME_ZONE.
 */
export function createSystemCalendar(env?: Record<string, string | undefined>): CalendarPort {
  const { timeZone } = getTimeConfig(env);
  return createLuxonCalendarAdapter({ timeZone });
}
