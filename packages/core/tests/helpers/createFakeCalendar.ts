/**
 * Test Helper: calendar port with a pinned "now" and optional field overrides
 *
 * Delegates to a UTC luxon adapter. `overrides` replaces decomposed fields to
 * simulate a calendar service that breaks its contract.
 */

import { createLuxonCalendarAdapter } from '../../src/adapters/calendarLuxonAdapter.js';
import type { CalendarFields, CalendarPort, UtcReading } from '../../src/ports/calendarPort.js';

export interface FakeCalendarOptions {
  now?: UtcReading;
  overrides?: Partial<CalendarFields>;
}

export function createFakeCalendar(opts: FakeCalendarOptions = {}): CalendarPort {
  const base = createLuxonCalendarAdapter({ timeZone: 'utc' });

  return {
    ...base,
    nowUtc: () => opts.now ?? base.nowUtc(),
    decomposeUtc: (reading) => ({ ...base.decomposeUtc(reading), ...opts.overrides }),
  };
}
