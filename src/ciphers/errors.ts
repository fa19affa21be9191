/**
 * Cipher Errors
 *
 * All errors raised by the engines share the CipherError base so callers can
 * tell bad input apart from unexpected failures.
 */

export type CipherErrorCode = 'INVALID_KEY' | 'LENGTH_MISMATCH';

/**
 * Base class for cipher errors.
 */
export class CipherError extends Error {
  readonly code: CipherErrorCode;

  constructor(message: string, code: CipherErrorCode) {
    super(message);
    this.name = 'CipherError';
    this.code = code;
  }
}

/**
 * The supplied key contains no letters once normalized.
 * Raised before any text is transformed.
 */
export class InvalidKeyError extends CipherError {
  constructor(message: string = 'Invalid key: key must contain at least one letter A-Z') {
    super(message, 'INVALID_KEY');
    this.name = 'InvalidKeyError';
  }
}

/**
 * Transposition ciphertext does not fit the grid computed for the key.
 */
export class LengthMismatchError extends CipherError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      `Length mismatch: column heights cover ${expected} letters but ciphertext has ${actual}`,
      'LENGTH_MISMATCH'
    );
    this.name = 'LengthMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Check if an error came from a cipher engine.
 */
export function isCipherError(error: unknown): error is CipherError {
  return error instanceof CipherError;
}
