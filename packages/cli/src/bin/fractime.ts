#!/usr/bin/env node

/**
 * fractime CLI Entry Point
 */

import { program } from 'commander';
import { createCommandContext } from '../core/command-context.js';
import { handleError } from '../core/error-handler.js';
import { registerTimeCommands } from '../commands/time.js';

program
  .name('fractime')
  .description('Exact time arithmetic: calendar views and whole-unit elapsed counts')
  .version('0.1.0');

registerTimeCommands(program, createCommandContext(), {
  write: (text) => {
    process.stdout.write(`${text}\n`);
  },
});

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error) {
    const message = handleError(error, { argv: process.argv.slice(2) });
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

void main();
