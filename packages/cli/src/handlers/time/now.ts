/**
 * Handler for printing the current time
 */

import { Instant } from '@fractime/core';
import type { NowArgs } from '../../command-defs/time.js';
import type { CommandContext } from '../../types/index.js';

export function nowHandler(
  _args: NowArgs,
  ctx: CommandContext
): {
  local: string;
  utc: string;
} {
  const now = Instant.now(ctx.calendar());
  return {
    local: now.toString(),
    utc: now.toDebugString(),
  };
}
