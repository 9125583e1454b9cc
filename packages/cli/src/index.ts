/**
 * @fractime/cli
 *
 * Public API exports for the CLI package
 */

export * from './core/argument-parser.js';
export * from './core/output-formatter.js';
export * from './core/error-handler.js';
export * from './core/command-context.js';
export * from './commands/time.js';
export * from './handlers/time/now.js';
export * from './handlers/time/inspect.js';
export * from './handlers/time/since.js';
export type * from './types/index.js';
