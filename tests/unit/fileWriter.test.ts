/**
 * File Writer Unit Tests
 *
 * Tests for output path validation and file writing inside a temporary
 * working directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { validateOutputPath, writeOutputFile } from '../../src/utils/fileWriter.js';
import { ConfigError } from '../../src/config.js';

let cwd: string;

beforeEach(async () => {
  cwd = await mkdtemp(join(tmpdir(), 'codebreakers-'));
});

afterEach(async () => {
  await rm(cwd, { recursive: true, force: true });
});

describe('validateOutputPath', () => {
  it('should accept paths inside the working directory', () => {
    expect(validateOutputPath('out.txt', cwd)).toBe('out.txt');
    expect(validateOutputPath('./nested/out.txt', cwd)).toBe('./nested/out.txt');
    expect(validateOutputPath(join(cwd, 'abs.txt'), cwd)).toBe(join(cwd, 'abs.txt'));
  });

  it('should reject paths escaping the working directory', () => {
    expect(() => validateOutputPath('../outside.txt', cwd)).toThrow(ConfigError);
    expect(() => validateOutputPath('nested/../../outside.txt', cwd)).toThrow(ConfigError);
  });

  it('should reject absolute paths outside the working directory', () => {
    expect(() => validateOutputPath('/etc/passwd', cwd)).toThrow(
      'Invalid output path: path traversal detected.'
    );
  });

  it('should reject the working directory itself', () => {
    expect(() => validateOutputPath('.', cwd)).toThrow(ConfigError);
  });
});

describe('writeOutputFile', () => {
  it('should write the content and return the absolute path', async () => {
    const written = await writeOutputFile('result.txt', 'BUIFW TEQXV\n', cwd);
    expect(written).toBe(join(cwd, 'result.txt'));
    await expect(readFile(written, 'utf-8')).resolves.toBe('BUIFW TEQXV\n');
  });

  it('should create missing parent directories', async () => {
    const written = await writeOutputFile('a/b/result.txt', 'XY\n', cwd);
    expect(written).toBe(join(cwd, 'a', 'b', 'result.txt'));
    await expect(readFile(written, 'utf-8')).resolves.toBe('XY\n');
  });

  it('should refuse to write outside the working directory', async () => {
    await expect(writeOutputFile('../escape.txt', 'X', cwd)).rejects.toThrow(ConfigError);
  });
});
