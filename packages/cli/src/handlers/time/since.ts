/**
 * Handler for counting whole units between two timestamps
 */

import { parseRationalDuration } from '@fractime/core';
import type { SinceArgs } from '../../command-defs/time.js';
import type { CommandContext } from '../../types/index.js';
import { resolveInstant } from './resolve-instant.js';

export interface SinceResult {
  from: string;
  to: string;
  unit: string;
  /** Decimal string; counts can exceed Number.MAX_SAFE_INTEGER. */
  count: string;
}

export function sinceHandler(args: SinceArgs, ctx: CommandContext): SinceResult {
  const calendar = ctx.calendar();
  const unit = parseRationalDuration(args.unit);
  const from = resolveInstant(args.from, calendar, args.local);
  const to = resolveInstant(args.to, calendar, args.local);

  return {
    from: from.toDebugString(),
    to: to.toDebugString(),
    unit: unit.toString(),
    count: to.elapsedUnits(from, unit).toString(),
  };
}
