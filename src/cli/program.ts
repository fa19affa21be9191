/**
 * Commander Program Definition
 *
 * Configures the CLI program and its subcommands.
 * This file focuses only on Commander setup - no command execution logic.
 */

import { Argument, Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import type { CliOptions } from '../config.js';
import type { CommandName } from '../types/index.js';
import { logWarning } from '../utils/logger.js';

// Get package.json version: two levels up from src/cli, three from dist/src/cli
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPaths = [
  join(__dirname, '..', '..', 'package.json'),
  join(__dirname, '..', '..', '..', 'package.json'),
];

function readVersion(path: string): string | undefined {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

function getVersion(): string {
  for (const path of packageJsonPaths) {
    const version = readVersion(path);
    if (version !== undefined) {
      return version;
    }
  }
  return '1.0.0';
}

/**
 * Called once with the options of the subcommand Commander matched.
 */
export type InvocationHandler = (options: CliOptions) => void;

/**
 * Create and configure the Commander program.
 *
 * Subcommand actions only collect options and hand them to `onInvocation`;
 * running the command is up to the caller.
 *
 * @param onInvocation - Receives the parsed options of the matched subcommand
 * @returns Configured Commander program instance
 */
export function createProgram(onInvocation: InvocationHandler): Command {
  const program = new Command();

  program
    .name('codebreakers')
    .description('Classical ciphers and frequency analysis: Vigenère, columnar transposition, letter counts')
    .version(getVersion(), '-V, --version', 'Show version number')

    // Output
    .option('-o, --output <path>', 'Write result to a file instead of stdout')
    .option('--group-size <n>', 'Letters per output group, 0 for no grouping (default: 5)')
    .option('--groups-per-line <n>', 'Groups per output line (default: 5)')

    // Debug
    .option('--verbose', 'Show detailed progress on stderr')

    // Throw instead of calling process.exit; subcommands created below
    // inherit this setting
    .exitOverride();

  program
    .command('vigenere')
    .description('Vigenère cipher, standard or autokey')
    .addArgument(new Argument('<direction>', 'What to do').choices(['encipher', 'decipher']))
    .argument('[file]', 'Input file (default: stdin)')
    .option('-k, --key <key>', 'Keyphrase (default: $CODEBREAKERS_KEY)')
    .option('--autokey', 'Extend the key with the plaintext instead of repeating it')
    .action((direction: string, file: string | undefined, _opts: unknown, command: Command) => {
      onInvocation(parseCliOptions('vigenere', direction, file, command.optsWithGlobals()));
    });

  program
    .command('transposition')
    .description('Columnar transposition cipher')
    .addArgument(new Argument('<direction>', 'What to do').choices(['encipher', 'decipher']))
    .argument('[file]', 'Input file (default: stdin)')
    .option('-k, --key <key>', 'Keyphrase (default: $CODEBREAKERS_KEY)')
    .action((direction: string, file: string | undefined, _opts: unknown, command: Command) => {
      onInvocation(parseCliOptions('transposition', direction, file, command.optsWithGlobals()));
    });

  program
    .command('frequency')
    .description('Count letters or digrams')
    .addArgument(new Argument('<analysis>', 'What to count').choices(['letters', 'digrams']))
    .argument('[file]', 'Input file (default: stdin)')
    .option('--top <n>', 'Show only the n most frequent entries, ranked')
    .option('--json', 'Print a JSON report instead of a table')
    .action((analysis: string, file: string | undefined, _opts: unknown, command: Command) => {
      onInvocation(parseCliOptions('frequency', analysis, file, command.optsWithGlobals()));
    });

  program.addHelpText(
    'after',
    `
Examples:
  # Encipher a file with a repeating key
  $ codebreakers vigenere encipher message.txt --key LEMON

  # Autokey, reading from stdin
  $ echo "attack at dawn" | codebreakers vigenere encipher --autokey -k QUEEN

  # Columnar transposition without letter groups
  $ codebreakers --group-size 0 transposition decipher cipher.txt -k ZEBRAS

  # Ten most frequent digrams as JSON
  $ codebreakers frequency digrams intercept.txt --top 10 --json

Notes:
  - Input is normalized: only the letters A-Z are kept, uppercased
  - The key may also come from CODEBREAKERS_KEY (or a .env file)
  - Results go to stdout, diagnostics to stderr
`
  );

  return program;
}

// ============================================
// Option Parsing
// ============================================

function stringOption(opts: Record<string, unknown>, name: string): string | undefined {
  const value = opts[name];
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  logWarning(`Unexpected value for option '${name}' ignored.`);
  return undefined;
}

function booleanOption(opts: Record<string, unknown>, name: string): boolean | undefined {
  const value = opts[name];
  if (value === undefined || typeof value === 'boolean') {
    return value;
  }
  logWarning(`Unexpected value for option '${name}' ignored.`);
  return undefined;
}

/**
 * Parse Commander options to the CliOptions interface.
 *
 * Commander options arrive untyped; every field is checked for the expected
 * primitive type and dropped with a warning otherwise.
 *
 * @param command - Matched subcommand
 * @param action - First positional argument (direction or analysis)
 * @param file - Optional input file argument
 * @param opts - Options from `optsWithGlobals()`
 * @returns Normalized CLI options
 */
export function parseCliOptions(
  command: CommandName,
  action: string,
  file: string | undefined,
  opts: Record<string, unknown>
): CliOptions {
  return {
    command,
    action,
    file,
    key: stringOption(opts, 'key'),
    autokey: booleanOption(opts, 'autokey'),
    top: stringOption(opts, 'top'),
    json: booleanOption(opts, 'json'),
    output: stringOption(opts, 'output'),
    groupSize: stringOption(opts, 'groupSize'),
    groupsPerLine: stringOption(opts, 'groupsPerLine'),
    verbose: booleanOption(opts, 'verbose'),
  };
}
