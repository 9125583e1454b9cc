/**
 * Argument Parser - Zod-based validation and parsing
 */

import { z } from 'zod';
import { ValidationError } from '@fractime/utils';
import type { CivilDateTime } from '@fractime/core';

/**
 * Parse and validate arguments using Zod schema
 */
export function parseArguments<T extends z.ZodTypeAny>(
  schema: T,
  rawArgs: Record<string, unknown>
): z.output<T> {
  const result = schema.safeParse(rawArgs);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `  ${path}: ${issue.message}`;
    });

    throw new ValidationError(`Invalid arguments:\n${messages.join('\n')}`, {
      formattedMessages: messages,
    });
  }
  return result.data;
}

const TIMESTAMP_PATTERN =
  /^(-?\d{4,})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?)?(Z?)$/;

export interface ParsedTimestamp {
  fields: CivilDateTime;
  /** The value ended in `Z`, so it is UTC whatever the command's zone flag says. */
  utc: boolean;
}

/**
 * Parse `YYYY-MM-DD[(T| )HH:MM[:SS]][Z]` into calendar fields.
 *
 * Only the shape is checked here; whether the fields form a real date is
 * up to the calendar.
 */
export function parseTimestamp(value: unknown): ParsedTimestamp {
  if (typeof value !== 'string') {
    throw new ValidationError('Timestamp must be a string', { value, type: typeof value });
  }

  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    throw new ValidationError(
      `Invalid timestamp: ${value}. Expected YYYY-MM-DD or YYYY-MM-DDTHH:MM:SS`,
      { value }
    );
  }

  const [, year, month, day, hour, minute, second, zulu] = match;
  return {
    fields: {
      year: Number(year),
      month: Number(month),
      day: Number(day),
      hour: Number(hour ?? 0),
      minute: Number(minute ?? 0),
      second: Number(second ?? 0),
    },
    utc: zulu === 'Z',
  };
}
