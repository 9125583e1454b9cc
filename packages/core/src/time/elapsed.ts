/**
 * Elapsed units
 *
 * Counts whole unit-sized intervals between two instants with exact integer
 * arithmetic: `Δ / unit = Δ × denominator / seconds`.
 */

import { ArithmeticOverflowError, ZeroDurationUnitError } from '@fractime/utils';
import type { RationalDuration } from './duration.js';
import type { Instant } from './instant.js';

const NANOS_PER_SECOND = 1_000_000_000n;

const INT64_MIN = -(1n << 63n);
const INT64_MAX = (1n << 63n) - 1n;
const INT128_MIN = -(1n << 127n);
const INT128_MAX = (1n << 127n) - 1n;

function checked(value: bigint, bits: 64 | 128, operation: string): bigint {
  const [min, max] = bits === 64 ? [INT64_MIN, INT64_MAX] : [INT128_MIN, INT128_MAX];
  if (value < min || value > max) {
    throw new ArithmeticOverflowError(operation, bits, { value: value.toString() });
  }
  return value;
}

/**
 * Whole `unit` intervals from `baseline` to `reference`: positive when
 * `reference` is later, negative when earlier. Truncates toward zero.
 *
 * @throws InvalidDurationDenominatorError when `unit.denominator` is 0
 * @throws ZeroDurationUnitError when `unit` is zero-length
 * @throws ArithmeticOverflowError when an intermediate leaves 128 bits or the
 *   count leaves 64 bits
 */
export function elapsedUnits(
  reference: Instant,
  baseline: Instant,
  unit: RationalDuration
): bigint {
  unit.assertUsable('elapsedUnits');
  if (unit.seconds === 0n) {
    throw new ZeroDurationUnitError({ unit: unit.toString() });
  }

  const span = reference.since(baseline);
  const scaledSeconds = checked(span.seconds * unit.denominator, 128, 'elapsedUnits seconds');
  const scaledNanos = checked(span.nanoseconds * unit.denominator, 128, 'elapsedUnits nanoseconds');

  // The part of the seconds that does not divide evenly moves into the nanoseconds.
  // Both share the sign of the span, so truncating each quotient matches
  // truncating the whole.
  const carried = scaledSeconds % unit.seconds;
  const nanos = checked(scaledNanos + carried * NANOS_PER_SECOND, 128, 'elapsedUnits carry');

  const fromSeconds = scaledSeconds / unit.seconds;
  const fromNanos = nanos / unit.seconds / NANOS_PER_SECOND;

  return checked(fromSeconds + fromNanos, 64, 'elapsedUnits');
}
