/**
 * Command Context - lazy creation of the services commands need
 *
 * This is the composition root: the only place the system calendar is built.
 */

import { createSystemCalendar, type CalendarPort } from '@fractime/core';
import type { CommandContext } from '../types/index.js';

export interface CommandContextOptions {
  /**
   * Override the calendar (for testing)
   */
  calendarOverride?: CalendarPort;
  /**
   * Environment used to configure the system calendar
   */
  env?: Record<string, string | undefined>;
}

export function createCommandContext(options: CommandContextOptions = {}): CommandContext {
  let calendar: CalendarPort | undefined = options.calendarOverride;

  return {
    calendar(): CalendarPort {
      if (!calendar) {
        calendar = createSystemCalendar(options.env);
      }
      return calendar;
    },
  };
}
