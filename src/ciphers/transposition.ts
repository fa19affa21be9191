/**
 * Columnar Transposition Cipher
 *
 * The message is written row by row into as many columns as the key has
 * letters, then read out column by column in the alphabetical order of the
 * key letters. Message "NO JUSTICE NO PEACE", key "CAB":
 *
 * ```text
 *   C  A  B          rank 2 0 1
 *   -------
 *   N  O  J
 *   U  S  T
 *   I  C  E
 *   N  O  P
 *   E  A  C
 *   E
 * ```
 *
 * Reading the A, B, then C column gives OSCOAJTEPCNUINEE.
 *
 * The last row is never padded, so columns can differ in height by one.
 * Deciphering rebuilds those heights from the message length before
 * putting the columns back.
 */

import { letterToIndex, type Letter } from './alphabet.js';
import { createKey } from './key.js';
import { LengthMismatchError } from './errors.js';
import { fromLetters, toLetters } from '../processing/normalize.js';
import type { Key, NormalizedText } from '../schemas/text.js';

// ============================================
// Column Ordering
// ============================================

/**
 * Column positions in read-out order.
 *
 * Columns are sorted by key letter; equal letters keep their left-to-right
 * order, so duplicate key letters are allowed.
 *
 * @example
 * ```typescript
 * columnOrder(createKey('ZEBRA')); // [4, 2, 1, 3, 0]
 * ```
 */
export function columnOrder(key: Key): number[] {
  const letters = toLetters(key);

  return letters
    .map((letter, position) => ({ letter, position }))
    .sort((a, b) => letterToIndex(a.letter) - letterToIndex(b.letter) || a.position - b.position)
    .map((column) => column.position);
}

/**
 * Rank of each column position in the read-out order (0-based).
 *
 * - "BACD" → [1, 0, 2, 3]
 * - "BAACDDZZXY" → [2, 0, 1, 3, 4, 5, 8, 9, 6, 7]
 */
export function columnRanks(key: Key): number[] {
  const order = columnOrder(key);
  const ranks: number[] = new Array<number>(order.length).fill(0);
  order.forEach((position, rank) => {
    ranks[position] = rank;
  });
  return ranks;
}

/**
 * Height of each column position for a message of `length` letters.
 *
 * Every column holds at least floor(length / width) letters; the leftmost
 * `length mod width` columns hold one more.
 */
export function columnHeights(length: number, key: Key): number[] {
  const width = key.length;
  const baseHeight = Math.floor(length / width);
  const remainder = length % width;

  return Array.from({ length: width }, (_, position) =>
    position < remainder ? baseHeight + 1 : baseHeight
  );
}

// ============================================
// Enciphering / Deciphering
// ============================================

/**
 * Encipher normalized plaintext with columnar transposition.
 *
 * @param plaintext - Normalized plaintext
 * @param keyphrase - Raw keyphrase, normalized before use
 * @returns The plaintext letters, reordered
 * @throws InvalidKeyError if the keyphrase has no letters
 */
export function transpositionEncipher(plaintext: NormalizedText, keyphrase: string): NormalizedText {
  const key = createKey(keyphrase);
  const width = key.length;
  const letters = toLetters(plaintext);
  const enciphered: Letter[] = [];

  for (const column of columnOrder(key)) {
    for (let index = column; index < letters.length; index += width) {
      enciphered.push(letters[index]);
    }
  }

  return fromLetters(enciphered);
}

/**
 * Decipher normalized ciphertext produced by transpositionEncipher.
 *
 * @param ciphertext - Normalized ciphertext
 * @param keyphrase - Raw keyphrase, normalized before use
 * @returns The recovered plaintext
 * @throws InvalidKeyError if the keyphrase has no letters
 * @throws LengthMismatchError if the column heights do not cover the ciphertext
 */
export function transpositionDecipher(ciphertext: NormalizedText, keyphrase: string): NormalizedText {
  const key = createKey(keyphrase);
  const width = key.length;
  const letters = toLetters(ciphertext);
  const heights = columnHeights(letters.length, key);

  const covered = heights.reduce((sum, height) => sum + height, 0);
  if (covered !== letters.length) {
    throw new LengthMismatchError(covered, letters.length);
  }

  // Cut the ciphertext into columns in read-out order, then put each column
  // back at its original position
  const columns: Letter[][] = Array.from({ length: width }, () => []);
  let cursor = 0;
  for (const column of columnOrder(key)) {
    columns[column] = letters.slice(cursor, cursor + heights[column]);
    cursor += heights[column];
  }

  const deciphered: Letter[] = [];
  for (let index = 0; index < letters.length; index++) {
    deciphered.push(columns[index % width][Math.floor(index / width)]);
  }

  return fromLetters(deciphered);
}
