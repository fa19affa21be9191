/**
 * Cipher Module Exports
 *
 * Barrel export for the cipher engines, plus the dispatcher the CLI uses to
 * run one of them on raw input.
 */

import { normalize } from '../processing/normalize.js';
import type { CipherName, Direction } from '../schemas/commandConfig.js';
import type { NormalizedText } from '../schemas/text.js';
import { transpositionDecipher, transpositionEncipher } from './transposition.js';
import { vigenereDecipher, vigenereEncipher } from './vigenere.js';

// ============================================
// Re-exports
// ============================================

export {
  LETTERS,
  ALPHABET_SIZE,
  isLetter,
  letterToIndex,
  indexToLetter,
  addLetters,
  subtractLetters,
  allDigrams,
  mod,
  type Letter,
  type Digram,
} from './alphabet.js';

export {
  CipherError,
  InvalidKeyError,
  LengthMismatchError,
  isCipherError,
  type CipherErrorCode,
} from './errors.js';

export { createKey } from './key.js';

export { vigenereEncipher, vigenereDecipher, type VigenereOptions } from './vigenere.js';

export {
  transpositionEncipher,
  transpositionDecipher,
  columnOrder,
  columnRanks,
  columnHeights,
} from './transposition.js';

// ============================================
// Dispatcher
// ============================================

/**
 * A cipher operation on raw, not yet normalized input.
 */
export interface CipherRequest {
  cipher: CipherName;
  direction: Direction;
  /** Raw keyphrase */
  key: string;
  /** Raw text or bytes */
  text: string | Uint8Array;
}

/**
 * Normalize the input and run the selected cipher on it.
 *
 * @param request - Cipher, direction, key and raw text
 * @returns Unformatted result letters
 * @throws InvalidKeyError if the key has no letters
 */
export function runCipher(request: CipherRequest): NormalizedText {
  const text = normalize(request.text);
  const encipher = request.direction === 'encipher';

  switch (request.cipher) {
    case 'vigenere':
      return encipher
        ? vigenereEncipher(text, request.key)
        : vigenereDecipher(text, request.key);
    case 'vigenere-autokey':
      return encipher
        ? vigenereEncipher(text, request.key, { autokey: true })
        : vigenereDecipher(text, request.key, { autokey: true });
    case 'transposition':
      return encipher
        ? transpositionEncipher(text, request.key)
        : transpositionDecipher(text, request.key);
  }
}
