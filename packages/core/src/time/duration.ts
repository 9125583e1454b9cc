/**
 * Rational durations
 *
 * A duration is kept as the exact fraction `seconds / denominator` so a unit
 * such as one third of a second can drive a counter indefinitely without
 * accumulating rounding error.
 */

import { z } from 'zod';
import { InvalidDurationDenominatorError, ValidationError } from '@fractime/utils';

export type IntegerLike = number | bigint;

function toBigInt(value: IntegerLike, field: string): bigint {
  if (typeof value === 'bigint') {
    return value;
  }
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError(`${field} must be a safe integer`, { field, value });
  }
  return BigInt(value);
}

function abs(value: bigint): bigint {
  return value < 0n ? -value : value;
}

function gcd(a: bigint, b: bigint): bigint {
  let x = a;
  let y = b;
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

export class RationalDuration {
  /** Signed numerator; carries the sign of the whole quantity. */
  readonly seconds: bigint;
  readonly denominator: bigint;

  /**
   * A zero denominator is accepted here and rejected when the value is used.
   */
  constructor(seconds: IntegerLike, denominator: IntegerLike) {
    this.seconds = toBigInt(seconds, 'seconds');
    const den = toBigInt(denominator, 'denominator');
    if (den < 0n) {
      throw new ValidationError('denominator must be unsigned', { denominator: den.toString() });
    }
    this.denominator = den;
  }

  /**
   * Throws InvalidDurationDenominatorError when the denominator is zero.
   */
  assertUsable(operation: string): void {
    if (this.denominator === 0n) {
      throw new InvalidDurationDenominatorError(operation, { duration: this.toString() });
    }
  }

  /**
   * `value × factor`. A negative factor moves its sign onto `seconds`.
   */
  scaleByInteger(factor: IntegerLike): RationalDuration {
    this.assertUsable('scaleByInteger');
    let magnitude = toBigInt(factor, 'factor');
    let seconds = this.seconds;
    if (magnitude < 0n) {
      seconds = -seconds;
      magnitude = -magnitude;
    }
    return new RationalDuration(seconds * magnitude, this.denominator);
  }

  /**
   * `value / factor`, computed by growing the denominator.
   */
  divideByInteger(factor: IntegerLike): RationalDuration {
    this.assertUsable('divideByInteger');
    let magnitude = toBigInt(factor, 'factor');
    if (magnitude === 0n) {
      throw new InvalidDurationDenominatorError('divideByInteger', {
        duration: this.toString(),
        factor: '0',
      });
    }
    let seconds = this.seconds;
    if (magnitude < 0n) {
      seconds = -seconds;
      magnitude = -magnitude;
    }
    return new RationalDuration(seconds, this.denominator * magnitude);
  }

  /**
   * Lowest terms. Zero simplifies to `0/1`.
   */
  simplify(): RationalDuration {
    this.assertUsable('simplify');
    if (this.seconds === 0n) {
      return new RationalDuration(0n, 1n);
    }
    const divisor = gcd(abs(this.seconds), this.denominator);
    return new RationalDuration(this.seconds / divisor, this.denominator / divisor);
  }

  equals(other: RationalDuration): boolean {
    this.assertUsable('equals');
    other.assertUsable('equals');
    return this.seconds * other.denominator === other.seconds * this.denominator;
  }

  toString(): string {
    return `${this.seconds}/${this.denominator}`;
  }
}

/** 1 nanosecond. */
export const NANOSECOND = new RationalDuration(1, 1_000_000_000);
/** 1 microsecond. */
export const MICROSECOND = new RationalDuration(1, 1_000_000);
/** 1 millisecond. */
export const MILLISECOND = new RationalDuration(1, 1_000);
/** 1 second. */
export const SECOND = new RationalDuration(1, 1);
/** 1 minute. */
export const MINUTE = new RationalDuration(60, 1);
/** 1 hour. */
export const HOUR = new RationalDuration(60 * 60, 1);
/** 1 day. */
export const DAY = new RationalDuration(24 * 60 * 60, 1);

const NAMED_UNITS = {
  ns: NANOSECOND,
  us: MICROSECOND,
  ms: MILLISECOND,
  s: SECOND,
  min: MINUTE,
  h: HOUR,
  d: DAY,
} as const satisfies Record<string, RationalDuration>;

export type NamedUnit = keyof typeof NAMED_UNITS;

function isNamedUnit(text: string): text is NamedUnit {
  return Object.prototype.hasOwnProperty.call(NAMED_UNITS, text);
}

const FRACTION_PATTERN = /^(-?\d+)(?:\/(\d+))?$/;

/**
 * Accepts `"S/D"`, `"S"` (denominator 1) or a unit name (`ns` … `d`).
 */
export const RationalDurationSchema = z
  .string()
  .trim()
  .min(1, 'duration is empty')
  .transform((text, ctx): RationalDuration => {
    if (isNamedUnit(text)) {
      return NAMED_UNITS[text];
    }
    const match = FRACTION_PATTERN.exec(text);
    if (!match) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'expected "S/D", "S" or one of ns, us, ms, s, min, h, d',
      });
      return z.NEVER;
    }
    return new RationalDuration(BigInt(match[1]), BigInt(match[2] ?? '1'));
  });

export function parseRationalDuration(text: string): RationalDuration {
  const result = RationalDurationSchema.safeParse(text);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? 'invalid duration';
    throw new ValidationError(`Invalid duration "${text}": ${reason}`, { input: text });
  }
  return result.data;
}
