/**
 * Handler for showing the calendar view of a timestamp
 */

import { DayOfWeek, Month } from '@fractime/core';
import type { InspectArgs } from '../../command-defs/time.js';
import type { CommandContext } from '../../types/index.js';
import { resolveInstant } from './resolve-instant.js';

export interface InspectResult {
  utc: string;
  local: string;
  year: number;
  month: string;
  day: number;
  dayOfWeek: string;
  hour: number;
  minute: number;
  second: number;
  nanosecond: number;
}

export function inspectHandler(args: InspectArgs, ctx: CommandContext): InspectResult {
  const instant = resolveInstant(args.timestamp, ctx.calendar(), args.local);

  return {
    utc: instant.toDebugString(),
    local: instant.toString(),
    year: instant.year(),
    month: Month[instant.month()],
    day: instant.day(),
    dayOfWeek: DayOfWeek[instant.dayOfWeek()],
    hour: instant.hour(),
    minute: instant.minute(),
    second: instant.second(),
    nanosecond: instant.nanosecond(),
  };
}
