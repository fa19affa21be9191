/**
 * Text Normalization
 *
 * Every cipher and analyzer works on normalized text: the ASCII letters of
 * the input, uppercased, in their original order. Everything else
 * (whitespace, punctuation, digits, accented letters) is dropped.
 */

import { isLetter, type Letter } from '../ciphers/alphabet.js';
import { NormalizedTextSchema, type NormalizedText } from '../schemas/text.js';

const decoder = new TextDecoder('utf-8');

/**
 * Normalize raw input for enciphering, deciphering or analysis.
 *
 * Transformations applied:
 * 1. Decode bytes as UTF-8 (when given a byte buffer)
 * 2. Remove every character that is not an ASCII letter
 * 3. Convert to uppercase
 *
 * Never fails; input without letters yields an empty string.
 *
 * @param raw - Raw text or bytes, e.g. file contents or stdin
 * @returns Normalized text
 */
export function normalize(raw: string | Uint8Array): NormalizedText {
  const text = typeof raw === 'string' ? raw : decoder.decode(raw);

  return NormalizedTextSchema.parse(text.replace(/[^A-Za-z]/g, '').toUpperCase());
}

/**
 * Check whether a string is already normalized.
 */
export function isNormalized(value: string): value is NormalizedText {
  return NormalizedTextSchema.safeParse(value).success;
}

/**
 * Letters of a normalized text, typed for alphabet arithmetic.
 */
export function toLetters(text: NormalizedText): Letter[] {
  return [...text].filter(isLetter);
}

/**
 * Join letters back into normalized text.
 */
export function fromLetters(letters: readonly Letter[]): NormalizedText {
  return NormalizedTextSchema.parse(letters.join(''));
}
