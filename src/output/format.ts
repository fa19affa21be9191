/**
 * Output Formatting
 *
 * Renders cipher results and frequency tables as text. Nothing here is
 * colored; the CLI writes these strings to stdout or a file as they are.
 */

import { LETTERS } from '../ciphers/alphabet.js';
import {
  digramCount,
  rankLetters,
  topDigrams,
  type DigramTable,
  type FrequencyTable,
} from '../analysis/frequency.js';

// ============================================
// Letter Groups
// ============================================

export interface GroupOptions {
  /** Letters per group; 0 disables grouping */
  groupSize?: number;
  /** Groups per line */
  groupsPerLine?: number;
}

export const DEFAULT_GROUP_SIZE = 5;
export const DEFAULT_GROUPS_PER_LINE = 5;

/**
 * Split text into the traditional blocks of five letters, five blocks to a
 * line.
 *
 * @example
 * ```typescript
 * formatGroups('BUIFWTEQXVVPKREXY'); // 'BUIFW TEQXV VPKRE XY'
 * ```
 */
export function formatGroups(text: string, options: GroupOptions = {}): string {
  const groupSize = options.groupSize ?? DEFAULT_GROUP_SIZE;
  const groupsPerLine = Math.max(1, options.groupsPerLine ?? DEFAULT_GROUPS_PER_LINE);

  if (groupSize <= 0) {
    return text;
  }

  const groups = chunk([...text], groupSize).map((letters) => letters.join(''));
  return chunk(groups, groupsPerLine)
    .map((line) => line.join(' '))
    .join('\n');
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

// ============================================
// Letter Frequencies
// ============================================

/**
 * One line per letter, A to Z, with a bar of `|` per occurrence.
 *
 * ```text
 * A |||
 * B ||
 * C
 * ```
 */
export function renderLetterHistogram(table: FrequencyTable): string {
  return LETTERS.map((letter) => `${letter} ${'|'.repeat(table.get(letter) ?? 0)}`.trimEnd()).join(
    '\n'
  );
}

/**
 * Letters with their counts, most frequent first.
 */
export function renderLetterRanking(table: FrequencyTable, limit?: number): string {
  const ranked = rankLetters(table);
  return ranked
    .slice(0, limit ?? ranked.length)
    .map(({ letter, count }) => `${letter} ${count}`)
    .join('\n');
}

// ============================================
// Digram Frequencies
// ============================================

/**
 * Full 26 x 26 digram grid, one row per leading letter.
 * Cells read `AB( 2)`; unseen pairs leave the count blank.
 */
export function renderDigramTable(table: DigramTable): string {
  return LETTERS.map((first) =>
    LETTERS.map((second) => {
      const count = digramCount(table, `${first}${second}`);
      return `${first}${second}(${count > 0 ? String(count).padStart(2) : '  '})`;
    }).join('  ')
  ).join('\n');
}

/**
 * The most frequent digrams with their counts.
 */
export function renderDigramRanking(table: DigramTable, limit: number): string {
  return topDigrams(table, limit)
    .map(({ digram, count }) => `${digram} ${count}`)
    .join('\n');
}
