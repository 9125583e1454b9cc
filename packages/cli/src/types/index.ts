/**
 * CLI Types
 */

import type { CalendarPort } from '@fractime/core';

export type OutputFormat = 'json' | 'table';

/**
 * Where command output goes. Logs go to stderr through the logger.
 */
export interface OutputWriter {
  write(text: string): void;
}

export interface CommandContext {
  calendar(): CalendarPort;
}
