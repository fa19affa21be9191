/**
 * Logger with Key Redaction
 *
 * All logging functions sanitize output so a keyphrase never shows up in a
 * diagnostic. Everything is written to stderr: stdout carries the cipher
 * output and must stay clean for piping.
 */

import chalk from 'chalk';
import { ENV_KEYS } from '../config.js';

// ============================================
// Logger State
// ============================================

/**
 * Global verbose mode flag.
 * Set via setVerbose() before running a command.
 */
let verboseMode = false;

/**
 * Secrets registered at runtime, e.g. a key given with --key.
 */
const secrets = new Set<string>();

/**
 * Enable or disable verbose logging
 */
export function setVerbose(enabled: boolean): void {
  verboseMode = enabled;
}

/**
 * Check if verbose mode is enabled
 */
export function isVerbose(): boolean {
  return verboseMode;
}

// ============================================
// Secrets Sanitization
// ============================================

/**
 * Shorter secrets are not redacted; a one-letter key would blank out every
 * occurrence of that letter.
 */
export const MIN_REDACTED_LENGTH = 3;

/**
 * Register a value that must never appear in log output.
 */
export function registerSecret(value: string): void {
  const trimmed = value.trim();
  if (trimmed.length >= MIN_REDACTED_LENGTH) {
    secrets.add(trimmed);
  }
}

/**
 * Forget all registered secrets.
 */
export function clearSecrets(): void {
  secrets.clear();
}

/**
 * Sanitize text to remove keys.
 *
 * SECURITY: This function MUST be called before any console output.
 * It removes:
 * 1. The key from the CODEBREAKERS_KEY environment variable
 * 2. Keys registered with registerSecret()
 *
 * @param text - Text to sanitize
 * @returns Sanitized text with keys replaced by [REDACTED]
 */
export function sanitize(text: string): string {
  const candidates = new Set(secrets);
  const envKey = process.env[ENV_KEYS.CODEBREAKERS_KEY]?.trim();
  if (envKey && envKey.length >= MIN_REDACTED_LENGTH) {
    candidates.add(envKey);
  }

  let sanitized = text;
  // Longest first, so a key containing another key is redacted whole
  for (const secret of [...candidates].sort((a, b) => b.length - a.length)) {
    sanitized = sanitized.split(secret).join('[REDACTED]');
  }

  return sanitized;
}

// ============================================
// Formatting
// ============================================

/**
 * Format duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

// ============================================
// Logging Functions
// ============================================

/**
 * Log stage header (verbose mode only).
 * Creates a visual separator between the steps of a command.
 */
export function logStage(name: string): void {
  if (!verboseMode) {
    return;
  }
  const line = '─'.repeat(50);
  console.error('');
  console.error(chalk.cyan(line));
  console.error(chalk.cyan.bold(`  ${sanitize(name)}`));
  console.error(chalk.cyan(line));
}

/**
 * Log success message in green.
 */
export function logSuccess(message: string): void {
  console.error(chalk.green(`✓ ${sanitize(message)}`));
}

/**
 * Log warning message in yellow.
 */
export function logWarning(message: string): void {
  console.error(chalk.yellow(`⚠ ${sanitize(message)}`));
}

/**
 * Log error message in red.
 */
export function logError(message: string): void {
  console.error(chalk.red(`✗ ${sanitize(message)}`));
}

/**
 * Log info message (default color).
 */
export function logInfo(message: string): void {
  console.error(chalk.white(`  ${sanitize(message)}`));
}

/**
 * Log verbose message (only if verbose mode enabled).
 */
export function logVerbose(message: string): void {
  if (verboseMode) {
    console.error(chalk.gray(`  [verbose] ${sanitize(message)}`));
  }
}

// ============================================
// Specialized Logging
// ============================================

/**
 * Log the resolved command configuration (verbose mode only).
 * The key itself is never printed, only whether one is set.
 */
export function logConfig(config: {
  operation: string;
  input: string;
  output: string;
  grouping: string;
  keySet?: boolean;
}): void {
  if (!verboseMode) {
    return;
  }

  console.error('');
  console.error(chalk.cyan.bold('  Command Configuration:'));
  console.error(chalk.gray('  ─────────────────────────────'));
  console.error(chalk.white(`  Operation:     ${sanitize(config.operation)}`));
  console.error(chalk.white(`  Input:         ${sanitize(config.input)}`));
  console.error(chalk.white(`  Output:        ${sanitize(config.output)}`));
  console.error(chalk.white(`  Grouping:      ${config.grouping}`));
  if (config.keySet !== undefined) {
    console.error(chalk.white(`  Key:           ${config.keySet ? 'set' : 'not set'}`));
  }
  console.error('');
}

/**
 * Log final command result
 */
export function logCommandResult(success: boolean, durationMs: number, detail?: string): void {
  if (success) {
    logVerbose(`Completed in ${formatDuration(durationMs)}${detail ? ` (${detail})` : ''}`);
    return;
  }

  logError(`Failed after ${formatDuration(durationMs)}`);
  if (detail) {
    console.error(chalk.red(`  Error: ${sanitize(detail)}`));
  }
}
