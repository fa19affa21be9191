/**
 * Frequency Analysis
 *
 * Letters keep their "personalities" under simple substitution: E stays the
 * most common letter, TH the most common pair. Counting single letters and
 * overlapping digrams is the first step of breaking such a cipher.
 */

import { LETTERS, type Digram, type Letter } from '../ciphers/alphabet.js';
import { toLetters } from '../processing/normalize.js';
import type { NormalizedText } from '../schemas/text.js';

// ============================================
// Types
// ============================================

/** Count for every letter A-Z, zero when unseen, in alphabetical order */
export type FrequencyTable = ReadonlyMap<Letter, number>;

/** Count for every observed digram, in first-seen order */
export type DigramTable = ReadonlyMap<Digram, number>;

export interface RankedLetter {
  letter: Letter;
  count: number;
}

export interface RankedDigram {
  digram: Digram;
  count: number;
}

// ============================================
// Counting
// ============================================

/**
 * Count each letter of the text.
 *
 * @param text - Normalized text
 * @returns Table with all 26 letters; counts add up to text.length
 */
export function letterFrequency(text: NormalizedText): FrequencyTable {
  const counts = new Map<Letter, number>(LETTERS.map((letter) => [letter, 0]));

  for (const letter of toLetters(text)) {
    counts.set(letter, (counts.get(letter) ?? 0) + 1);
  }

  return counts;
}

/**
 * Count each pair of adjacent letters, with overlapping windows.
 *
 * "AAA" holds the pair AA twice (positions 0-1 and 1-2). Texts shorter than
 * two letters produce an empty table.
 *
 * @param text - Normalized text
 * @returns Table of observed digrams; counts add up to max(0, text.length - 1)
 */
export function digramFrequency(text: NormalizedText): DigramTable {
  const letters = toLetters(text);
  const counts = new Map<Digram, number>();

  for (let i = 0; i + 1 < letters.length; i++) {
    const digram: Digram = `${letters[i]}${letters[i + 1]}`;
    counts.set(digram, (counts.get(digram) ?? 0) + 1);
  }

  return counts;
}

// ============================================
// Table Helpers
// ============================================

/**
 * Count of a digram, 0 when it was never observed.
 */
export function digramCount(table: DigramTable, digram: Digram): number {
  return table.get(digram) ?? 0;
}

/**
 * Sum of all counts in a table.
 */
export function totalCount<K>(table: ReadonlyMap<K, number>): number {
  let total = 0;
  for (const count of table.values()) {
    total += count;
  }
  return total;
}

/**
 * Letters from most to least frequent; ties in alphabetical order.
 */
export function rankLetters(table: FrequencyTable): RankedLetter[] {
  return [...table.entries()]
    .map(([letter, count]) => ({ letter, count }))
    .sort((a, b) => b.count - a.count || compareAscii(a.letter, b.letter));
}

/**
 * The `limit` most frequent digrams; ties in alphabetical order.
 */
export function topDigrams(table: DigramTable, limit: number): RankedDigram[] {
  return [...table.entries()]
    .map(([digram, count]) => ({ digram, count }))
    .sort((a, b) => b.count - a.count || compareAscii(a.digram, b.digram))
    .slice(0, Math.max(0, limit));
}

function compareAscii(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
