#!/usr/bin/env node
/**
 * Codebreakers CLI
 *
 * Main entry point for the CLI application.
 * Parses arguments, validates configuration, and runs the command.
 *
 * Usage:
 *   npx tsx src/index.ts <command> <action> [file] [options]
 */

import { CommanderError } from 'commander';
import {
  createProgram,
  createErrorContext,
  runCommand,
  withErrorHandling,
  EXIT_CODES,
  type ExitCode,
} from './cli/index.js';
import { buildConfig, type CliOptions } from './config.js';
import { setVerbose, sanitize } from './utils/logger.js';

// ============================================
// Main Entry Point
// ============================================

/**
 * Main CLI entry point.
 *
 * Flow:
 * 1. Parse CLI arguments with Commander
 * 2. Build configuration from options, environment and defaults
 * 3. Run the command with error handling
 * 4. Resolve to the exit code
 */
async function main(argv: string[]): Promise<ExitCode> {
  const invocations: CliOptions[] = [];
  const program = createProgram((options) => {
    invocations.push(options);
  });

  try {
    program.parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander already printed help, the version or the parse error
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.CONFIG_ERROR;
    }
    throw error;
  }

  const options = invocations.at(0);
  if (options === undefined) {
    program.outputHelp();
    return EXIT_CODES.CONFIG_ERROR;
  }

  // Set verbose mode early so configuration warnings get context
  setVerbose(options.verbose ?? false);

  const result = await withErrorHandling(async () => {
    const config = buildConfig(options);
    return runCommand(config);
  }, createErrorContext(options.command));

  return result.success ? EXIT_CODES.SUCCESS : result.exitCode;
}

// ============================================
// Execution
// ============================================

// Exit code is set rather than calling process.exit so piped stdout is
// flushed before the process ends
main(process.argv)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    // Only reached for bugs in error handling itself; no stack trace
    const errorMessage =
      error instanceof Error ? error.message : 'An unexpected error occurred';
    console.error('Unexpected error:', sanitize(errorMessage));
    process.exitCode = EXIT_CODES.RUNTIME_ERROR;
  });
