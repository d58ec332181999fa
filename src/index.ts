#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import fs from 'fs/promises';
import { constants } from 'fs';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { LogLevel } from './types/index.js';

// Import command setup functions
import { setupInstallCommand } from './commands/install.js';
import { setupTreeCommand } from './commands/tree.js';

/**
 * modpin CLI - Main entry point
 *
 * Resolves the modules a source tree imports, checks each out at a pinned
 * revision and records the graph in modpin.yml.
 */

// Create the main program
const program = new Command();

// Configure the main program
program
  .name('modpin')
  .description('modpin - import-driven dependency installer')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .option('--verbose', 'log debug output')
  .configureHelp({ sortSubcommands: true });

// === COMMAND REGISTRATION ===
setupInstallCommand(program);
setupTreeCommand(program);

// Validate global options before any command runs
program.hook('preAction', async (thisCommand) => {
  const opts: { cwd?: string; verbose?: boolean } = thisCommand.opts();
  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
  if (opts.cwd) {
    const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
    try {
      const stats = await fs.stat(resolvedCwd);
      if (!stats.isDirectory()) {
        throw new Error(`'${opts.cwd}' is not a directory`);
      }
      await fs.access(resolvedCwd, constants.R_OK | constants.W_OK);
      logger.info(`Working directory will be: ${resolvedCwd}`);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      logger.error('Invalid --cwd provided', { error: errMsg, cwd: opts.cwd });
      console.error(`❌ Invalid --cwd '${opts.cwd}': Directory must exist, be accessible, and writable. Details: ${errMsg}`);
      process.exit(1);
    }
  } else {
    logger.debug(`Working directory: ${process.cwd()}`);
  }
});

// === GLOBAL ERROR HANDLING ===

/**
 * Handle uncaught exceptions
 */
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Please check the logs for details.');
  process.exit(1);
});

/**
 * Handle unhandled promise rejections
 */
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Please check the logs for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  try {
    // If no arguments provided (just 'modpin'), show help and exit successfully
    if (process.argv.length <= 2) {
      program.outputHelp();
      process.exit(0);
    }

    // Parse command line arguments
    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('modpin')
  )) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

// Export the program for testing purposes
export { program };
