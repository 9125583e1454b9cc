/**
 * Resolve a timestamp argument to an Instant
 */

import { Instant, type CalendarPort } from '@fractime/core';
import { InvalidCalendarDateError } from '@fractime/utils';
import { parseTimestamp } from '../../core/argument-parser.js';

/**
 * `local` reads the fields as wall time in the calendar's zone, except for a
 * value marked with `Z`, which is always UTC.
 */
export function resolveInstant(value: string, calendar: CalendarPort, local: boolean): Instant {
  const { fields, utc } = parseTimestamp(value);
  const asLocal = local && !utc;
  const instant = asLocal ? Instant.fromLocal(calendar, fields) : Instant.fromUtc(calendar, fields);
  if (!instant) {
    throw new InvalidCalendarDateError(value, { ...fields, local: asLocal });
  }
  return instant;
}
