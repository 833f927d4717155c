#!/usr/bin/env node
/**
 * Corpus Builder CLI
 *
 * Main entry point for the CLI application.
 * Parses arguments and runs the harvest, clean or run command.
 *
 * Usage:
 *   npx tsx src/index.ts <harvest|clean|run> [options]
 */

import { CommanderError } from 'commander';
import { createProgram, executeCommand, EXIT_CODES, type ExitCode } from './cli/index.js';
import { sanitize } from './utils/logger.js';

// ============================================
// Main Entry Point
// ============================================

/**
 * Main CLI entry point.
 *
 * Flow:
 * 1. Parse CLI arguments with Commander
 * 2. Build configuration from options
 * 3. Run pre-flight checks (config file, dry-run)
 * 4. Execute the command with error handling
 * 5. Exit with appropriate code
 */
async function main(argv: string[]): Promise<ExitCode> {
  let exitCode: ExitCode = EXIT_CODES.SUCCESS;

  const program = createProgram(async (command, options) => {
    exitCode = await executeCommand(command, options);
  });

  // Throw instead of exiting so usage errors map to CONFIG_ERROR
  program.exitOverride();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander already printed its message
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        return EXIT_CODES.SUCCESS;
      }
      return EXIT_CODES.CONFIG_ERROR;
    }
    throw error;
  }

  return exitCode;
}

// ============================================
// Execution
// ============================================

main(process.argv)
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    // Only the sanitized message; stack traces may carry paths or keys
    const errorMessage =
      error instanceof Error ? error.message : 'An unexpected error occurred';
    console.error('Unexpected error:', sanitize(errorMessage));
    process.exit(EXIT_CODES.PIPELINE_ERROR);
  });
