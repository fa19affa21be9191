/**
 * Configuration Unit Tests
 *
 * Tests for environment reading and the merge of defaults, environment
 * and CLI options into a CommandConfig.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import {
  buildConfig,
  readEnvironment,
  getEnvKey,
  parseDirection,
  parseAnalysisKind,
  parseGroupSize,
  parseGroupsPerLine,
  parseTop,
  resolveCipherName,
  ConfigError,
  DEFAULT_OUTPUT_SETTINGS,
  type CliOptions,
} from '../../src/config.js';

let errorSpy: MockInstance<typeof console.error>;

beforeEach(() => {
  errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  errorSpy.mockRestore();
});

// ============================================
// Environment
// ============================================

describe('getEnvKey', () => {
  it('should return the key when set', () => {
    expect(getEnvKey({ CODEBREAKERS_KEY: 'lemon' })).toBe('lemon');
  });

  it('should treat a blank key as unset', () => {
    expect(getEnvKey({ CODEBREAKERS_KEY: '   ' })).toBeUndefined();
    expect(getEnvKey({})).toBeUndefined();
  });
});

describe('readEnvironment', () => {
  it('should coerce numeric settings', () => {
    expect(
      readEnvironment({ CODEBREAKERS_GROUP_SIZE: '4', CODEBREAKERS_GROUPS_PER_LINE: '10' })
    ).toEqual({ groupSize: 4, groupsPerLine: 10 });
  });

  it('should accept a group size of 0', () => {
    expect(readEnvironment({ CODEBREAKERS_GROUP_SIZE: '0' })).toEqual({ groupSize: 0 });
  });

  it('should ignore invalid values with a warning', () => {
    expect(
      readEnvironment({ CODEBREAKERS_GROUP_SIZE: 'five', CODEBREAKERS_GROUPS_PER_LINE: '0' })
    ).toEqual({});
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining("Invalid CODEBREAKERS_GROUP_SIZE value 'five' ignored")
    );
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining("Invalid CODEBREAKERS_GROUPS_PER_LINE value '0' ignored")
    );
  });
});

// ============================================
// Option Parsers
// ============================================

describe('option parsers', () => {
  it('should parse directions case-insensitively', () => {
    expect(parseDirection('Encipher')).toBe('encipher');
    expect(parseDirection('decipher')).toBe('decipher');
  });

  it('should reject unknown directions', () => {
    expect(() => parseDirection('rotate')).toThrow(ConfigError);
    expect(() => parseDirection('rotate')).toThrow(
      "Invalid direction 'rotate'. Valid options: encipher, decipher"
    );
  });

  it('should parse analysis kinds', () => {
    expect(parseAnalysisKind('digrams')).toBe('digrams');
    expect(() => parseAnalysisKind('trigrams')).toThrow(ConfigError);
  });

  it('should parse group sizes and fall back on invalid input', () => {
    expect(parseGroupSize(undefined, 5)).toBe(5);
    expect(parseGroupSize('0', 5)).toBe(0);
    expect(parseGroupSize('-1', 5)).toBe(5);
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining("Invalid --group-size value '-1'. Using default: 5")
    );
  });

  it('should require at least one group per line', () => {
    expect(parseGroupsPerLine('3', 5)).toBe(3);
    expect(parseGroupsPerLine('0', 5)).toBe(5);
  });

  it('should ignore an invalid --top', () => {
    expect(parseTop('10')).toBe(10);
    expect(parseTop('0')).toBeUndefined();
    expect(parseTop('many')).toBeUndefined();
  });

  it('should resolve the cipher name', () => {
    expect(resolveCipherName('vigenere', undefined)).toBe('vigenere');
    expect(resolveCipherName('vigenere', true)).toBe('vigenere-autokey');
    expect(resolveCipherName('transposition', true)).toBe('transposition');
  });
});

// ============================================
// buildConfig
// ============================================

describe('buildConfig', () => {
  const cipherOptions: CliOptions = {
    command: 'vigenere',
    action: 'encipher',
    key: 'lemon',
  };

  it('should apply defaults', () => {
    expect(buildConfig(cipherOptions, {})).toEqual({
      ...DEFAULT_OUTPUT_SETTINGS,
      command: 'cipher',
      cipher: 'vigenere',
      direction: 'encipher',
      key: 'lemon',
    });
  });

  it('should select autokey', () => {
    const config = buildConfig({ ...cipherOptions, autokey: true }, {});
    expect(config.command === 'cipher' && config.cipher).toBe('vigenere-autokey');
  });

  it('should fall back to the environment key', () => {
    const config = buildConfig(
      { command: 'transposition', action: 'decipher' },
      { CODEBREAKERS_KEY: 'zebra' }
    );
    expect(config.command === 'cipher' && config.key).toBe('zebra');
  });

  it('should prefer --key over the environment', () => {
    const config = buildConfig(cipherOptions, { CODEBREAKERS_KEY: 'zebra' });
    expect(config.command === 'cipher' && config.key).toBe('lemon');
  });

  it('should leave the key unset when none is given', () => {
    const config = buildConfig({ command: 'vigenere', action: 'decipher' }, {});
    expect(config.command === 'cipher' && config.key).toBeUndefined();
  });

  it('should let CLI options override environment settings', () => {
    const config = buildConfig(
      { ...cipherOptions, groupSize: '2' },
      { CODEBREAKERS_GROUP_SIZE: '4', CODEBREAKERS_GROUPS_PER_LINE: '8' }
    );
    expect(config.groupSize).toBe(2);
    expect(config.groupsPerLine).toBe(8);
  });

  it('should keep the environment value when a CLI value is invalid', () => {
    const config = buildConfig(
      { ...cipherOptions, groupSize: 'abc' },
      { CODEBREAKERS_GROUP_SIZE: '4' }
    );
    expect(config.groupSize).toBe(4);
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining("Invalid --group-size value 'abc'. Using default: 4")
    );
  });

  it('should carry input, output and verbose settings', () => {
    const config = buildConfig(
      { ...cipherOptions, file: 'in.txt', output: 'out.txt', verbose: true },
      {}
    );
    expect(config.inputPath).toBe('in.txt');
    expect(config.outputPath).toBe('out.txt');
    expect(config.verbose).toBe(true);
  });

  it('should build a frequency configuration', () => {
    expect(
      buildConfig({ command: 'frequency', action: 'digrams', top: '10', json: true }, {})
    ).toEqual({
      ...DEFAULT_OUTPUT_SETTINGS,
      command: 'frequency',
      analysis: 'digrams',
      top: 10,
      json: true,
    });
  });

  it('should default json to false', () => {
    const config = buildConfig({ command: 'frequency', action: 'letters' }, {});
    expect(config.command === 'frequency' && config.json).toBe(false);
  });

  it('should reject an invalid direction', () => {
    expect(() => buildConfig({ command: 'vigenere', action: 'sideways' }, {})).toThrow(ConfigError);
  });

  it('should reject an empty output path', () => {
    expect(() => buildConfig({ ...cipherOptions, output: '' }, {})).toThrow(
      /^Invalid configuration: outputPath: /
    );
  });
});
