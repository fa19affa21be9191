/**
 * CLI Stdin Utilities
 *
 * Reading piped input and prompting for a key interactively.
 */

import * as readline from 'readline';
import chalk from 'chalk';

// ============================================
// Piped Input
// ============================================

/**
 * Read a stream to its end.
 *
 * The whole input is buffered before any cipher runs.
 *
 * @param stream - Input stream (default: process.stdin)
 * @returns Raw bytes
 */
export async function readStdin(
  stream: AsyncIterable<Buffer | string> = process.stdin
): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return Buffer.concat(chunks);
}

/**
 * Whether stdin is attached to a terminal (nothing piped in).
 */
export function isInteractive(): boolean {
  return process.stdin.isTTY === true;
}

// ============================================
// Readline Interface
// ============================================

/**
 * Create a readline interface for CLI interaction.
 * Prompts go to stderr so they never mix with cipher output.
 *
 * @returns Configured readline.Interface for stdin/stderr
 */
export function createReadlineInterface(): readline.Interface {
  return readline.createInterface({
    input: process.stdin,
    output: process.stderr,
    terminal: true,
  });
}

/**
 * Close the readline interface.
 *
 * @param rl - The readline interface to close
 */
export function closeReadline(rl: readline.Interface): void {
  rl.close();
}

// ============================================
// Question Utilities
// ============================================

/**
 * Ask user a question and get response.
 *
 * @param rl - Readline interface
 * @param question - Question text to display
 * @returns User's answer (trimmed)
 */
export async function askQuestion(
  rl: readline.Interface,
  question: string
): Promise<string> {
  return new Promise((resolve) => {
    rl.question(chalk.cyan(question), (answer) => {
      resolve(answer.trim());
    });
  });
}

/**
 * Prompt for a keyphrase on the terminal.
 *
 * Opens and closes its own readline interface.
 *
 * @returns The keyphrase as typed (possibly empty)
 */
export async function promptForKey(): Promise<string> {
  const rl = createReadlineInterface();
  try {
    return await askQuestion(rl, 'Key: ');
  } finally {
    closeReadline(rl);
  }
}
