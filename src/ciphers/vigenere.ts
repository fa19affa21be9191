/**
 * Vigenère Cipher
 *
 * Polyalphabetic substitution. With plaintext P, ciphertext C and
 * keystream K, letter by letter:
 *
 *   encipher: C = P + K (mod 26)
 *   decipher: P = C - K (mod 26)
 *
 * Standard mode repeats the key for as long as the text runs. Autokey mode
 * primes the keystream with the key and then continues it with the
 * plaintext itself, so the keystream never repeats.
 */

import { addLetters, subtractLetters, type Letter } from './alphabet.js';
import { createKey } from './key.js';
import { fromLetters, toLetters } from '../processing/normalize.js';
import type { NormalizedText } from '../schemas/text.js';

export interface VigenereOptions {
  /** Extend the keystream with the plaintext instead of repeating the key */
  autokey?: boolean;
}

/**
 * Encipher normalized plaintext.
 *
 * @param plaintext - Normalized plaintext
 * @param keyphrase - Raw keyphrase, normalized before use
 * @param options - Standard (default) or autokey mode
 * @returns Ciphertext of the same length as the plaintext
 * @throws InvalidKeyError if the keyphrase has no letters
 *
 * @example
 * ```typescript
 * vigenereEncipher(normalize('now is the time'), 'TYPE'); // 'GMLMLRWIMGBI'
 * ```
 */
export function vigenereEncipher(
  plaintext: NormalizedText,
  keyphrase: string,
  options: VigenereOptions = {}
): NormalizedText {
  const key = toLetters(createKey(keyphrase));
  const letters = toLetters(plaintext);

  // Autokey: K = key || plaintext, only the first letters.length entries are used
  const keystream = options.autokey ? [...key, ...letters] : repeatKey(key, letters.length);

  return fromLetters(letters.map((letter, i) => addLetters(letter, keystream[i])));
}

/**
 * Decipher normalized ciphertext.
 *
 * In autokey mode the keystream past the priming key is the recovered
 * plaintext, so position i can only be deciphered once position
 * i - key.length is known. The loop below runs strictly left to right.
 *
 * @param ciphertext - Normalized ciphertext
 * @param keyphrase - Raw keyphrase, normalized before use
 * @param options - Standard (default) or autokey mode
 * @returns Plaintext of the same length as the ciphertext
 * @throws InvalidKeyError if the keyphrase has no letters
 */
export function vigenereDecipher(
  ciphertext: NormalizedText,
  keyphrase: string,
  options: VigenereOptions = {}
): NormalizedText {
  const key = toLetters(createKey(keyphrase));
  const letters = toLetters(ciphertext);

  if (!options.autokey) {
    const keystream = repeatKey(key, letters.length);
    return fromLetters(letters.map((letter, i) => subtractLetters(letter, keystream[i])));
  }

  const keystream: Letter[] = [...key];
  const recovered: Letter[] = [];

  for (let i = 0; i < letters.length; i++) {
    const plain = subtractLetters(letters[i], keystream[i]);
    recovered.push(plain);
    keystream.push(plain);
  }

  return fromLetters(recovered);
}

/**
 * Repeat (or truncate) the key to exactly `length` letters.
 */
function repeatKey(key: readonly Letter[], length: number): Letter[] {
  return Array.from({ length }, (_, i) => key[i % key.length]);
}
