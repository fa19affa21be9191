/**
 * Configuration & Environment Variables
 *
 * Handles environment loading and merges defaults, environment and CLI
 * options into the configuration a command runs with.
 */

import 'dotenv/config';
import { z } from 'zod';
import type { CipherName, CommandConfig, CommandName, OutputSettings } from './types/index.js';
import { DEFAULT_OUTPUT_SETTINGS } from './types/index.js';
import {
  AnalysisKindSchema,
  CommandConfigSchema,
  DirectionSchema,
  type AnalysisKind,
  type Direction,
} from './schemas/index.js';
import { logWarning } from './utils/logger.js';

// ============================================
// Environment Variable Names
// ============================================

export const ENV_KEYS = {
  /** Default keyphrase when --key is not given */
  CODEBREAKERS_KEY: 'CODEBREAKERS_KEY',
  /** Default letters per output group */
  CODEBREAKERS_GROUP_SIZE: 'CODEBREAKERS_GROUP_SIZE',
  /** Default groups per output line */
  CODEBREAKERS_GROUPS_PER_LINE: 'CODEBREAKERS_GROUPS_PER_LINE',
} as const;

// ============================================
// Errors
// ============================================

/**
 * Unusable configuration: bad option value, missing key or input file.
 * The CLI exits with CONFIG_ERROR for these.
 */
export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================
// Environment
// ============================================

/**
 * Settings picked up from the environment (and .env).
 */
export interface EnvironmentConfig {
  key?: string;
  groupSize?: number;
  groupsPerLine?: number;
}

const GroupSizeEnvSchema = z.coerce.number().int().min(0);
const GroupsPerLineEnvSchema = z.coerce.number().int().min(1);

/**
 * Get the default key from the environment.
 * SECURITY: the value is registered with the logger for redaction, never logged.
 *
 * @returns The key, or undefined when unset or blank
 */
export function getEnvKey(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[ENV_KEYS.CODEBREAKERS_KEY];
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

/**
 * Read CODEBREAKERS_* variables.
 * Invalid numbers are ignored with a warning rather than failing the run.
 */
export function readEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const result: EnvironmentConfig = {};

  const key = getEnvKey(env);
  if (key !== undefined) {
    result.key = key;
  }

  const groupSize = readNumericEnv(env, ENV_KEYS.CODEBREAKERS_GROUP_SIZE, GroupSizeEnvSchema, 'an integer >= 0');
  if (groupSize !== undefined) {
    result.groupSize = groupSize;
  }

  const groupsPerLine = readNumericEnv(
    env,
    ENV_KEYS.CODEBREAKERS_GROUPS_PER_LINE,
    GroupsPerLineEnvSchema,
    'an integer >= 1'
  );
  if (groupsPerLine !== undefined) {
    result.groupsPerLine = groupsPerLine;
  }

  return result;
}

function readNumericEnv(
  env: NodeJS.ProcessEnv,
  name: string,
  schema: z.ZodType<number>,
  expected: string
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    logWarning(`Invalid ${name} value '${raw}' ignored. Expected ${expected}`);
    return undefined;
  }
  return parsed.data;
}

// ============================================
// CLI Options
// ============================================

/**
 * CLI options as collected from Commander, before validation.
 */
export interface CliOptions {
  command: CommandName;
  /** encipher|decipher for ciphers, letters|digrams for frequency */
  action: string;
  file?: string;
  key?: string;
  autokey?: boolean;
  top?: string;
  json?: boolean;
  output?: string;
  groupSize?: string;
  groupsPerLine?: string;
  verbose?: boolean;
}

/**
 * Parse cipher direction.
 *
 * @throws ConfigError for anything but encipher/decipher
 */
export function parseDirection(value: string): Direction {
  const parsed = DirectionSchema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid direction '${value}'. Valid options: ${DirectionSchema.options.join(', ')}`
    );
  }
  return parsed.data;
}

/**
 * Parse frequency analysis kind.
 *
 * @throws ConfigError for anything but letters/digrams
 */
export function parseAnalysisKind(value: string): AnalysisKind {
  const parsed = AnalysisKindSchema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid analysis '${value}'. Valid options: ${AnalysisKindSchema.options.join(', ')}`
    );
  }
  return parsed.data;
}

/**
 * Parse --group-size. Valid range: 0 and up, 0 disables grouping.
 * Invalid values keep `fallback`.
 */
export function parseGroupSize(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    logWarning(`Invalid --group-size value '${value}'. Using default: ${fallback}`);
    return fallback;
  }
  return parsed;
}

/**
 * Parse --groups-per-line. Valid range: 1 and up.
 * Invalid values keep `fallback`.
 */
export function parseGroupsPerLine(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    logWarning(`Invalid --groups-per-line value '${value}'. Using default: ${fallback}`);
    return fallback;
  }
  return parsed;
}

/**
 * Parse --top. Invalid values disable the limit.
 */
export function parseTop(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    logWarning(`Invalid --top value '${value}' ignored. Expected a positive integer`);
    return undefined;
  }
  return parsed;
}

/**
 * Cipher selected by a command and its --autokey flag.
 */
export function resolveCipherName(command: CommandName, autokey: boolean | undefined): CipherName {
  if (command === 'transposition') {
    return 'transposition';
  }
  return autokey ? 'vigenere-autokey' : 'vigenere';
}

// ============================================
// Configuration Building
// ============================================

/**
 * Build the complete CommandConfig for a CLI invocation.
 *
 * Merging order (later overrides earlier):
 * 1. DEFAULT_OUTPUT_SETTINGS
 * 2. CODEBREAKERS_* environment variables
 * 3. Explicit CLI options
 *
 * The key stays undefined when neither --key nor CODEBREAKERS_KEY is set;
 * the command runner decides whether it can prompt for one.
 *
 * @param options - Options collected by the CLI program
 * @param env - Environment to read defaults from
 * @returns Validated configuration
 * @throws ConfigError if the direction/analysis is invalid or validation fails
 */
export function buildConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): CommandConfig {
  const environment = readEnvironment(env);

  const settings: OutputSettings = {
    ...DEFAULT_OUTPUT_SETTINGS,
    groupSize: environment.groupSize ?? DEFAULT_OUTPUT_SETTINGS.groupSize,
    groupsPerLine: environment.groupsPerLine ?? DEFAULT_OUTPUT_SETTINGS.groupsPerLine,
  };

  settings.groupSize = parseGroupSize(options.groupSize, settings.groupSize);
  settings.groupsPerLine = parseGroupsPerLine(options.groupsPerLine, settings.groupsPerLine);

  if (options.output !== undefined) {
    settings.outputPath = options.output;
  }

  if (options.verbose !== undefined) {
    settings.verbose = options.verbose;
  }

  const candidate =
    options.command === 'frequency'
      ? {
          ...settings,
          command: 'frequency',
          inputPath: options.file,
          analysis: parseAnalysisKind(options.action),
          top: parseTop(options.top),
          json: options.json ?? false,
        }
      : {
          ...settings,
          command: 'cipher',
          inputPath: options.file,
          cipher: resolveCipherName(options.command, options.autokey),
          direction: parseDirection(options.action),
          key: options.key ?? environment.key,
        };

  const parsed = CommandConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  return parsed.data;
}

// ============================================
// Re-exports for convenience
// ============================================

export { DEFAULT_OUTPUT_SETTINGS } from './types/index.js';

export type { CommandConfig, CommandName, OutputSettings } from './types/index.js';
