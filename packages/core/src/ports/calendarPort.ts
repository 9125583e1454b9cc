/**
 * Calendar Port
 *
 * The external calendar/timezone capability the time core consumes:
 * reading "now", decomposing an instant into calendar fields, resolving the
 * local UTC offset and validating calendar dates.
 *
 * Implementations are passed explicitly to Instant; there is no global calendar.
 */

/**
 * A UTC reading: whole seconds since the Unix epoch plus a sub-second part.
 * `nanosecond` may reach 1,999,999,999 to encode a leap second.
 */
export interface UtcReading {
  readonly epochSeconds: bigint;
  readonly nanosecond: number;
}

export interface CivilDateTime {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

/**
 * Raw decomposition as reported by the service. `month` is 1-12 and
 * `weekday` 0-6 (Sunday = 0) for a conforming service.
 */
export interface CalendarFields extends CivilDateTime {
  readonly nanosecond: number;
  readonly weekday: number;
}

export type CompositionResult =
  | { readonly ok: true; readonly reading: UtcReading }
  | { readonly ok: false; readonly reason: string };

export interface CalendarPort {
  nowUtc(): UtcReading;
  decomposeUtc(reading: UtcReading): CalendarFields;
  /** Offset of the host zone from UTC at the given instant, in seconds. */
  localOffsetSeconds(reading: UtcReading): number;
  composeUtc(fields: CivilDateTime): CompositionResult;
  /** Fields are wall-clock time in the host zone. */
  composeLocal(fields: CivilDateTime): CompositionResult;
}
