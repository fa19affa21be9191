/**
 * Type Definitions
 *
 * Re-exports the Zod-inferred types from schemas and defines the defaults
 * every command starts from.
 */

// ============================================
// Re-export all schema types
// ============================================

export type {
  // Text types
  NormalizedText,
  Key,

  // Command types
  CipherName,
  Direction,
  AnalysisKind,
  OutputSettings,
  CipherCommandConfig,
  FrequencyCommandConfig,
  CommandConfig,

  // Report types
  LetterCount,
  LetterReport,
  DigramCount,
  DigramReport,
  FrequencyReport,
} from '../schemas/index.js';

export type { Letter, Digram } from '../ciphers/alphabet.js';

import type { OutputSettings } from '../schemas/index.js';

// ============================================
// CLI Commands
// ============================================

/**
 * Top-level CLI commands
 */
export type CommandName = 'vigenere' | 'transposition' | 'frequency';

export const COMMAND_NAMES: readonly CommandName[] = ['vigenere', 'transposition', 'frequency'];

// ============================================
// Defaults
// ============================================

/**
 * Output defaults: five-letter groups, five groups per line.
 */
export const DEFAULT_OUTPUT_SETTINGS: OutputSettings = {
  groupSize: 5,
  groupsPerLine: 5,
  verbose: false,
};
