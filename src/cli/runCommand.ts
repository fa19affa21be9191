/**
 * Command Execution
 *
 * Runs one resolved CommandConfig: reads the input, resolves the key,
 * calls into the cipher engines or the frequency analyzer and writes the
 * rendered result.
 */

import { readFile } from 'node:fs/promises';
import { runCipher } from '../ciphers/index.js';
import { analyze, type AnalysisResult } from '../analysis/index.js';
import { ConfigError } from '../config.js';
import {
  formatGroups,
  renderDigramRanking,
  renderDigramTable,
  renderLetterHistogram,
  renderLetterRanking,
} from '../output/format.js';
import { buildDigramReport, buildLetterReport, serializeReport } from '../output/report.js';
import type {
  CipherCommandConfig,
  CommandConfig,
  FrequencyCommandConfig,
  OutputSettings,
} from '../types/index.js';
import { writeOutputFile } from '../utils/fileWriter.js';
import {
  logCommandResult,
  logConfig,
  logStage,
  logSuccess,
  logVerbose,
  registerSecret,
} from '../utils/logger.js';
import { isInteractive, promptForKey, readStdin } from '../utils/stdin.js';

// ============================================
// Types
// ============================================

/**
 * Side effects of a command. Defaults talk to the real process;
 * tests pass stand-ins.
 */
export interface CommandIO {
  /** Read all of stdin */
  readStdin: () => Promise<Uint8Array>;
  /** Ask for a key on the terminal */
  readKey: () => Promise<string>;
  /** Write result text to stdout */
  writeStdout: (text: string) => void;
  /** Whether stdin is a terminal a key can be typed on */
  interactive: boolean;
  /** Directory --output paths must stay inside */
  cwd: string;
}

export interface CommandResult {
  /** Rendered result, without the trailing newline */
  output: string;
  /** Absolute path written, when --output was given */
  outputPath?: string;
}

function defaultIO(): CommandIO {
  return {
    readStdin: () => readStdin(),
    readKey: promptForKey,
    writeStdout: (text) => {
      process.stdout.write(text);
    },
    interactive: isInteractive(),
    cwd: process.cwd(),
  };
}

// ============================================
// Input
// ============================================

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read the input file, or stdin when no file was given.
 *
 * @throws ConfigError if the input file does not exist
 */
async function readInput(inputPath: string | undefined, io: CommandIO): Promise<Uint8Array> {
  if (inputPath === undefined) {
    logVerbose('Reading input from stdin');
    return io.readStdin();
  }

  try {
    return await readFile(inputPath);
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigError(`Input file not found: ${inputPath}`);
    }
    throw error;
  }
}

/**
 * Resolve the keyphrase: --key or CODEBREAKERS_KEY (already merged into the
 * config), else a terminal prompt when stdin is free for one.
 *
 * @throws ConfigError if no key can be obtained
 */
async function resolveKey(config: CipherCommandConfig, io: CommandIO): Promise<string> {
  if (config.key !== undefined) {
    return config.key;
  }

  // Piped input occupies stdin, so prompting only works with a file argument
  if (config.inputPath !== undefined && io.interactive) {
    return io.readKey();
  }

  throw new ConfigError('No key given: use --key or set CODEBREAKERS_KEY');
}

// ============================================
// Rendering
// ============================================

/**
 * Render an analysis result the way the frequency command prints it.
 *
 * - `--json`: JSON report (letters always list all 26; digrams honor --top)
 * - `--top n`: the n most frequent entries, ranked
 * - otherwise: letter histogram or full digram grid
 */
export function renderAnalysis(result: AnalysisResult, config: FrequencyCommandConfig): string {
  if (result.kind === 'letters') {
    if (config.json) {
      return serializeReport(buildLetterReport(result.table));
    }
    return config.top !== undefined
      ? renderLetterRanking(result.table, config.top)
      : renderLetterHistogram(result.table);
  }

  if (config.json) {
    return serializeReport(buildDigramReport(result.table, config.top));
  }
  return config.top !== undefined
    ? renderDigramRanking(result.table, config.top)
    : renderDigramTable(result.table);
}

function describeGrouping(settings: OutputSettings): string {
  return settings.groupSize === 0
    ? 'none'
    : `${settings.groupSize} letters, ${settings.groupsPerLine} groups per line`;
}

function describeOperation(config: CommandConfig): string {
  return config.command === 'cipher'
    ? `${config.cipher} ${config.direction}`
    : `frequency ${config.analysis}`;
}

// ============================================
// Execution
// ============================================

async function execute(config: CommandConfig, input: Uint8Array, io: CommandIO): Promise<string> {
  if (config.command === 'frequency') {
    logStage(`Counting ${config.analysis}`);
    return renderAnalysis(analyze(config.analysis, input), config);
  }

  const key = await resolveKey(config, io);
  registerSecret(key);

  logStage(describeOperation(config));
  const letters = runCipher({
    cipher: config.cipher,
    direction: config.direction,
    key,
    text: input,
  });
  logVerbose(`Processed ${letters.length} letters`);

  return formatGroups(letters, {
    groupSize: config.groupSize,
    groupsPerLine: config.groupsPerLine,
  });
}

/**
 * Run a command end to end.
 *
 * @param config - Validated command configuration
 * @param overrides - Replacements for the default process IO
 * @returns The rendered output and where it went
 * @throws ConfigError for a missing input file or key
 * @throws InvalidKeyError if the key has no letters
 */
export async function runCommand(
  config: CommandConfig,
  overrides: Partial<CommandIO> = {}
): Promise<CommandResult> {
  const io: CommandIO = { ...defaultIO(), ...overrides };
  const startTime = Date.now();

  logConfig({
    operation: describeOperation(config),
    input: config.inputPath ?? 'stdin',
    output: config.outputPath ?? 'stdout',
    grouping: describeGrouping(config),
    keySet: config.command === 'cipher' ? config.key !== undefined : undefined,
  });

  const input = await readInput(config.inputPath, io);
  logVerbose(`Read ${input.length} bytes`);

  const output = await execute(config, input, io);

  const result: CommandResult = { output };
  if (config.outputPath !== undefined) {
    result.outputPath = await writeOutputFile(config.outputPath, `${output}\n`, io.cwd);
    logSuccess(`Wrote result to ${config.outputPath}`);
  } else {
    io.writeStdout(`${output}\n`);
  }

  logCommandResult(true, Date.now() - startTime);
  return result;
}
