/**
 * Vigenère Engine Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { vigenereEncipher, vigenereDecipher } from '../../src/ciphers/vigenere.js';
import { InvalidKeyError } from '../../src/ciphers/errors.js';
import { normalize } from '../../src/processing/normalize.js';

describe('vigenereEncipher', () => {
  it('should add the repeating key letter by letter', () => {
    expect(vigenereEncipher(normalize('INANOBSCURECORNER'), 'THISISMODERNWAR')).toBe(
      'BUIFWTEQXVVPKREXY'
    );
  });

  it('should repeat a key shorter than the text', () => {
    expect(vigenereEncipher(normalize('now is the time'), 'TYPE')).toBe('GMLMLRWIMGBI');
  });

  it('should normalize the keyphrase', () => {
    expect(vigenereEncipher(normalize('attack at dawn'), 'le-mon')).toBe('LXFOPVEFRNHR');
  });

  it('should leave text unchanged under key A', () => {
    expect(vigenereEncipher(normalize('HELLO'), 'A')).toBe('HELLO');
  });

  it('should return empty text for empty input', () => {
    expect(vigenereEncipher(normalize(''), 'KEY')).toBe('');
  });

  it('should reject a key without letters', () => {
    expect(() => vigenereEncipher(normalize('HELLO'), '42')).toThrow(InvalidKeyError);
    expect(() => vigenereEncipher(normalize(''), '')).toThrow(InvalidKeyError);
  });

  describe('autokey', () => {
    it('should extend the key with the plaintext', () => {
      expect(vigenereEncipher(normalize('AAAAAA'), 'ZZZ', { autokey: true })).toBe('ZZZAAA');
    });

    it('should match the repeating key while the key covers the text', () => {
      expect(vigenereEncipher(normalize('ABC'), 'XYZ', { autokey: true })).toBe(
        vigenereEncipher(normalize('ABC'), 'XYZ')
      );
    });

    it('should encipher a longer text', () => {
      expect(vigenereEncipher(normalize('attack at dawn'), 'QUEENLY', { autokey: true })).toBe(
        'QNXEPVYTWTWP'
      );
    });
  });
});

describe('vigenereDecipher', () => {
  it('should subtract the repeating key', () => {
    expect(vigenereDecipher(normalize('BUIFWTEQXVVPKREXY'), 'THISISMODERNWAR')).toBe(
      'INANOBSCURECORNER'
    );
  });

  it('should invert encipherment', () => {
    const plaintext = normalize('Now is the time for all good men');
    expect(vigenereDecipher(vigenereEncipher(plaintext, 'TYPE'), 'TYPE')).toBe(plaintext);
  });

  it('should reject a key without letters', () => {
    expect(() => vigenereDecipher(normalize('ABC'), ' ')).toThrow(InvalidKeyError);
  });

  describe('autokey', () => {
    it('should feed recovered plaintext back into the key', () => {
      expect(vigenereDecipher(normalize('ZZZAAA'), 'ZZZ', { autokey: true })).toBe('AAAAAA');
      expect(vigenereDecipher(normalize('QNXEPVYTWTWP'), 'QUEENLY', { autokey: true })).toBe(
        'ATTACKATDAWN'
      );
    });

    it('should differ from standard decipherment past the key length', () => {
      expect(vigenereDecipher(normalize('ZZZAAA'), 'ZZZ')).toBe('AAABBB');
    });

    it('should return empty text for empty input', () => {
      expect(vigenereDecipher(normalize(''), 'KEY', { autokey: true })).toBe('');
    });
  });
});
