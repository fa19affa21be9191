/**
 * CLI Error Handler
 *
 * Provides error handling utilities for command execution.
 * Handles error logging and exit code management.
 */

import { CommanderError } from 'commander';
import { InvalidKeyError } from '../ciphers/errors.js';
import { ConfigError } from '../config.js';
import { sanitize, logError, logCommandResult } from '../utils/logger.js';

// ============================================
// Exit Codes
// ============================================

/**
 * Exit codes for CLI.
 *
 * 0: Success - Command completed successfully
 * 1: Runtime error - I/O failure or unexpected error
 * 2: Configuration error - Bad option value, missing or invalid key
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  RUNTIME_ERROR: 1,
  CONFIG_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================
// Error Context
// ============================================

/**
 * Error context for command failures.
 */
export interface ErrorContext {
  /** Command being run, for the failure summary */
  command: string;
  /** Command start time (Date.now()) */
  startTime: number;
}

/**
 * Create an error context from common parameters.
 *
 * @param command - Command name
 * @param startTime - Command start time (default: now)
 */
export function createErrorContext(command: string, startTime: number = Date.now()): ErrorContext {
  return { command, startTime };
}

// ============================================
// Error Classification
// ============================================

/**
 * Determine if an error is a configuration error.
 *
 * Configuration errors are issues with the invocation (bad options, missing
 * or unusable key, missing input file) that the user needs to fix before
 * running the command again.
 *
 * @param error - The error to classify
 * @returns true if this is a configuration error
 */
export function isConfigError(error: Error): boolean {
  return (
    error instanceof ConfigError ||
    error instanceof InvalidKeyError ||
    error instanceof CommanderError
  );
}

/**
 * Get the appropriate exit code for an error.
 *
 * @param error - The error that occurred
 * @returns Exit code (1 for runtime errors, 2 for config errors)
 */
export function getExitCode(error: Error): ExitCode {
  return isConfigError(error) ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.RUNTIME_ERROR;
}

// ============================================
// Error Handling
// ============================================

/**
 * Handle command error - log and return exit code.
 *
 * @param error - The error that occurred
 * @param context - Error context
 * @returns Exit code (1 or 2)
 */
export function handleCommandError(error: Error, context: ErrorContext): ExitCode {
  const durationMs = Date.now() - context.startTime;
  const sanitizedMessage = sanitize(error.message);

  logError(`${context.command}: ${sanitizedMessage}`);
  logCommandResult(false, durationMs, sanitizedMessage);

  return getExitCode(error);
}

// ============================================
// Execution Wrapper
// ============================================

/**
 * Result type for withErrorHandling.
 */
export type ErrorHandlingResult<T> =
  | { success: true; result: T }
  | { success: false; exitCode: ExitCode };

/**
 * Wrap command execution with error handling.
 *
 * Catches every error from the command, logs it without a stack trace and
 * returns a structured result.
 *
 * @param fn - Async function to execute
 * @param context - Error context for handling failures
 * @returns Success with result, or failure with exit code
 *
 * @example
 * ```typescript
 * const result = await withErrorHandling(
 *   () => runCommand(config),
 *   createErrorContext('vigenere')
 * );
 *
 * process.exitCode = result.success ? EXIT_CODES.SUCCESS : result.exitCode;
 * ```
 */
export async function withErrorHandling<T>(
  fn: () => Promise<T>,
  context: ErrorContext
): Promise<ErrorHandlingResult<T>> {
  try {
    const result = await fn();
    return { success: true, result };
  } catch (error) {
    // Ensure we have an Error object
    const err = error instanceof Error ? error : new Error(String(error));

    const exitCode = handleCommandError(err, context);
    return { success: false, exitCode };
  }
}
