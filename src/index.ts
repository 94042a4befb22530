#!/usr/bin/env node

import { Command } from 'commander';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { logger, levelForVerbosity } from './utils/logger.js';
import { KEYGRAPH_VERSION } from './constants/index.js';

// Import command setup functions
import { setupDescribeCommand } from './commands/describe.js';
import { setupConfigureCommand } from './commands/configure.js';
import { setupKeysCommand } from './commands/keys.js';

/**
 * keygraph CLI - Main entry point
 *
 * Describes, documents and generates code for typed-key component graphs.
 */

// Create the main program
const program = new Command();

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

// Configure the main program
program
  .name('keygraph')
  .description('keygraph - typed configuration keys and component graphs')
  .version(KEYGRAPH_VERSION)
  .option('-v, --verbose', 'more logging; repeat for debug output', increaseVerbosity, 0)
  .configureHelp({ sortSubcommands: true });

setupDescribeCommand(program);
setupConfigureCommand(program);
setupKeysCommand(program);

program.hook('preAction', () => {
  const { verbose } = program.opts<{ verbose: number }>();
  // Without -v, keep the level taken from the environment
  if (verbose > 0) {
    logger.setLevel(levelForVerbosity(verbose));
  }
  logger.debug(`Working directory: ${process.cwd()}`);
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with -vv for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with -vv for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  // If no arguments provided (just 'keygraph'), show help and exit successfully
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Only run when executed directly (also through the npm bin link)
if (isMainModule()) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

// Export the program for testing purposes
export { program };
