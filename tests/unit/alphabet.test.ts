/**
 * Alphabet Arithmetic Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  LETTERS,
  ALPHABET_SIZE,
  isLetter,
  letterToIndex,
  indexToLetter,
  mod,
  addLetters,
  subtractLetters,
  allDigrams,
} from '../../src/ciphers/alphabet.js';

describe('alphabet', () => {
  it('should hold 26 letters in order', () => {
    expect(ALPHABET_SIZE).toBe(26);
    expect(LETTERS[0]).toBe('A');
    expect(LETTERS[25]).toBe('Z');
  });

  it('should recognize single uppercase letters only', () => {
    expect(isLetter('Q')).toBe(true);
    expect(isLetter('q')).toBe(false);
    expect(isLetter('QQ')).toBe(false);
    expect(isLetter('')).toBe(false);
  });

  it('should map letters to indices and back', () => {
    expect(letterToIndex('A')).toBe(0);
    expect(letterToIndex('Z')).toBe(25);
    expect(indexToLetter(7)).toBe('H');
  });

  it('should wrap indices modulo 26', () => {
    expect(indexToLetter(26)).toBe('A');
    expect(indexToLetter(-1)).toBe('Z');
    expect(mod(-1, 26)).toBe(25);
    expect(mod(53, 26)).toBe(1);
  });

  it('should add and subtract letters modulo 26', () => {
    expect(addLetters('I', 'T')).toBe('B');
    expect(addLetters('Z', 'B')).toBe('A');
    expect(subtractLetters('B', 'T')).toBe('I');
    expect(subtractLetters('A', 'B')).toBe('Z');
  });

  it('should list all 676 digrams', () => {
    const digrams = allDigrams();
    expect(digrams).toHaveLength(676);
    expect(digrams[0]).toBe('AA');
    expect(digrams[27]).toBe('BB');
    expect(digrams[675]).toBe('ZZ');
  });
});
