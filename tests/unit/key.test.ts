/**
 * Key Handling Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { createKey } from '../../src/ciphers/key.js';
import {
  CipherError,
  InvalidKeyError,
  LengthMismatchError,
  isCipherError,
} from '../../src/ciphers/errors.js';

describe('createKey', () => {
  it('should normalize the keyphrase', () => {
    expect(createKey('  ze-bra! ')).toBe('ZEBRA');
  });

  it('should reject a keyphrase without letters', () => {
    expect(() => createKey('123 !')).toThrow(InvalidKeyError);
    expect(() => createKey('')).toThrow(InvalidKeyError);
  });

  it('should tag the error with INVALID_KEY', () => {
    try {
      createKey('');
      expect.unreachable('createKey should throw');
    } catch (error) {
      expect(isCipherError(error)).toBe(true);
      expect(error).toBeInstanceOf(CipherError);
      if (error instanceof CipherError) {
        expect(error.code).toBe('INVALID_KEY');
        expect(error.name).toBe('InvalidKeyError');
      }
    }
  });
});

describe('LengthMismatchError', () => {
  it('should carry both lengths', () => {
    const error = new LengthMismatchError(10, 12);
    expect(error.code).toBe('LENGTH_MISMATCH');
    expect(error.expected).toBe(10);
    expect(error.actual).toBe(12);
    expect(error.message).toBe(
      'Length mismatch: column heights cover 10 letters but ciphertext has 12'
    );
  });

  it('should not be mistaken for a plain error', () => {
    expect(isCipherError(new Error('x'))).toBe(false);
  });
});
