/**
 * Configuration loading from environment variables
 *
 * Provides typed, zod-validated configuration for logging and for the
 * calendar zone the time core treats as "host local".
 */

import { z } from 'zod';
import * as path from 'path';
import { ConfigurationError } from '../errors.js';

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1'));

export const LoggingConfigSchema = z.object({
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  LOG_CONSOLE: booleanFlag(true),
  LOG_FILE: booleanFlag(false),
  LOG_DIR: z.string().min(1).optional(),
  LOG_MAX_FILES: z.string().min(1).default('14d'),
  LOG_MAX_SIZE: z.string().min(1).default('20m'),
  NODE_ENV: z.string().optional(),
});

export const TimeConfigSchema = z.object({
  FRACTIME_TIME_ZONE: z.string().trim().min(1).default('local'),
});

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
  production: boolean;
}

export interface TimeConfig {
  timeZone: string;
}

type Env = Record<string, string | undefined>;

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env): z.output<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const configKey = issue ? issue.path.join('.') : undefined;
    throw new ConfigurationError(
      `Invalid configuration${configKey ? ` for ${configKey}` : ''}: ${issue?.message ?? 'unknown issue'}`,
      configKey,
      { issues: result.error.issues.map((i) => i.message) }
    );
  }
  return result.data;
}

/**
 * Load logging configuration from environment variables
 */
export function getLoggingConfig(env: Env = process.env): LoggingConfig {
  const parsed = parseEnv(LoggingConfigSchema, env);
  const production = parsed.NODE_ENV === 'production';

  return {
    level: parsed.LOG_LEVEL ?? (production ? 'info' : 'debug'),
    enableConsole: parsed.LOG_CONSOLE,
    enableFile: parsed.LOG_FILE,
    logDir: parsed.LOG_DIR ?? path.join(process.cwd(), 'logs'),
    maxFiles: parsed.LOG_MAX_FILES,
    maxSize: parsed.LOG_MAX_SIZE,
    production,
  };
}

/**
 * Load time configuration. The zone is not checked here; the calendar
 * adapter rejects zones it cannot resolve.
 */
export function getTimeConfig(env: Env = process.env): TimeConfig {
  const parsed = parseEnv(TimeConfigSchema, env);
  return { timeZone: parsed.FRACTIME_TIME_ZONE };
}
