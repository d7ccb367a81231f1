#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

// Import command setup functions
import { setupResolveCommand } from './commands/resolve.js';
import { setupDownloadCommand } from './commands/download.js';
import { setupListCommand } from './commands/list.js';

/**
 * datadep CLI - Main entry point
 * 
 * Resolves named data dependencies to local paths, downloading them on first use.
 */

// Create the main program
const program = new Command();

program
  .name('datadep')
  .description('Resolve data dependencies by name, downloading them on first use')
  .version(getVersion())
  .option('--registry <file>', 'registry file declaring the data dependencies', 'datadeps.yml')
  .option('-y, --yes', 'accept the terms of use of every download')
  .configureHelp({ sortSubcommands: true });

setupResolveCommand(program);
setupDownloadCommand(program);
setupListCommand(program);

// === GLOBAL ERROR HANDLING ===

/**
 * Handle uncaught exceptions gracefully
 */
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with DATADEPS_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Handle unhandled promise rejections
 */
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with DATADEPS_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  // No arguments: show help and exit successfully
  if (process.argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync();
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('datadep')
  )) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
