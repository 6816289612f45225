#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

import { setupTreeCommand } from './commands/tree.js';
import { setupOrderCommand } from './commands/order.js';

/**
 * deptree CLI - Main entry point
 *
 * Explores a package's dependency graph: a cycle-safe tree view and a
 * dependencies-first loading order.
 */

const program = new Command();

program
  .name('deptree')
  .description('Explore the dependency graph of a package')
  .version(getVersion())
  .option('--cwd <dir>', 'resolve relative paths against this directory')
  .configureHelp({ sortSubcommands: true })
  .showHelpAfterError();

setupTreeCommand(program);
setupOrderCommand(program);

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  // No arguments: show help and exit successfully
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(argv);
}

// Only run when executed directly (node dist/index.js, tsx src/index.ts, or the bin link)
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('deptree')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
