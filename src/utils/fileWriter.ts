/**
 * File Writer
 *
 * Writes command output to a file instead of stdout.
 *
 * SECURITY: Includes path traversal protection to prevent writing outside cwd.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve, relative, isAbsolute } from 'node:path';
import { ConfigError } from '../config.js';
import { logVerbose } from './logger.js';

// ============================================
// Path Security
// ============================================

/**
 * Validate that an output path does not escape the working directory.
 *
 * Allowed paths:
 * - Relative paths within cwd (e.g., './out.txt', 'out/cipher.txt')
 * - Absolute paths that resolve to within cwd or its subdirectories
 *
 * Rejected paths:
 * - Paths that escape cwd (e.g., '../outside.txt', '../../etc/hosts')
 * - Absolute paths outside cwd (e.g., '/etc/passwd', '/tmp/out.txt')
 * - The working directory itself
 *
 * @param userPath - The path provided by the user
 * @param cwd - Directory the path must stay inside
 * @returns The validated path (unchanged if valid)
 * @throws ConfigError if path traversal is detected
 */
export function validateOutputPath(userPath: string, cwd: string = process.cwd()): string {
  const absolutePath = resolve(cwd, userPath);
  const relativeToCwd = relative(cwd, absolutePath);

  if (relativeToCwd === '' || relativeToCwd.startsWith('..') || isAbsolute(relativeToCwd)) {
    throw new ConfigError(
      `Invalid output path: path traversal detected. ` +
        `Path must be a file within the current working directory. ` +
        `Received: "${userPath}"`
    );
  }

  return userPath;
}

// ============================================
// Writing
// ============================================

/**
 * Ensure parent directory exists for a file path
 */
async function ensureParentDir(filePath: string): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });
}

/**
 * Write text output to a file, creating parent directories as needed.
 *
 * @param filePath - Output path, validated against path traversal
 * @param content - Text to write
 * @param cwd - Directory the path must stay inside
 * @returns Absolute path written
 */
export async function writeOutputFile(
  filePath: string,
  content: string,
  cwd: string = process.cwd()
): Promise<string> {
  validateOutputPath(filePath, cwd);

  const absolutePath = resolve(cwd, filePath);
  await ensureParentDir(absolutePath);
  await writeFile(absolutePath, content, 'utf-8');
  logVerbose(`Wrote ${content.length} characters to ${filePath}`);

  return absolutePath;
}
