/**
 * Time Commands
 */

import type { Command } from 'commander';
import { createLogger } from '@fractime/utils';
import { parseArguments } from '../core/argument-parser.js';
import { formatOutput } from '../core/output-formatter.js';
import { nowSchema, inspectSchema, sinceSchema } from '../command-defs/time.js';
import { nowHandler } from '../handlers/time/now.js';
import { inspectHandler } from '../handlers/time/inspect.js';
import { sinceHandler } from '../handlers/time/since.js';
import type { CommandContext, OutputFormat, OutputWriter } from '../types/index.js';

const log = createLogger('@fractime/cli');

function runCommand<A extends { format: OutputFormat }>(
  name: string,
  args: A,
  handler: (args: A, ctx: CommandContext) => unknown,
  ctx: CommandContext,
  out: OutputWriter
): void {
  const commandLog = log.child({ command: name });
  commandLog.debug('Running command', { args });
  out.write(formatOutput(handler(args, ctx), args.format));
  commandLog.debug('Command completed');
}

/**
 * Register time commands. Failures propagate to the caller of `parseAsync`.
 */
export function registerTimeCommands(
  program: Command,
  ctx: CommandContext,
  out: OutputWriter
): void {
  program
    .command('now')
    .description('Print the current time in the host zone and in UTC')
    .option('--format <format>', 'Output format (json, table)', 'table')
    .action((options: Record<string, unknown>) => {
      runCommand('now', parseArguments(nowSchema, options), nowHandler, ctx, out);
    });

  program
    .command('inspect')
    .description('Show the calendar fields of a timestamp')
    .argument('<timestamp>', 'YYYY-MM-DD[THH:MM[:SS]][Z], UTC unless --local without Z')
    .option('--local', 'Interpret the timestamp in the host zone unless it ends in Z', false)
    .option('--format <format>', 'Output format (json, table)', 'table')
    .action((timestamp: string, options: Record<string, unknown>) => {
      const args = parseArguments(inspectSchema, { ...options, timestamp });
      runCommand('inspect', args, inspectHandler, ctx, out);
    });

  program
    .command('since')
    .description('Count whole units elapsed from one timestamp to another')
    .argument('<from>', 'Baseline timestamp')
    .argument('<to>', 'Reference timestamp')
    .option('--unit <duration>', 'Unit: S/D, S, or ns|us|ms|s|min|h|d', 's')
    .option('--local', 'Interpret timestamps in the host zone unless they end in Z', false)
    .option('--format <format>', 'Output format (json, table)', 'table')
    .action((from: string, to: string, options: Record<string, unknown>) => {
      const args = parseArguments(sinceSchema, { ...options, from, to });
      runCommand('since', args, sinceHandler, ctx, out);
    });
}
