/**
 * Frequency Reports
 *
 * Builds the JSON documents for `frequency --json`, validated against the
 * report schemas before they are written.
 */

import { LETTERS } from '../ciphers/alphabet.js';
import { topDigrams, totalCount, type DigramTable, type FrequencyTable } from '../analysis/frequency.js';
import {
  DigramReportSchema,
  LetterReportSchema,
  type DigramReport,
  type LetterReport,
} from '../schemas/report.js';

/**
 * Report with all 26 letter counts in alphabetical order.
 */
export function buildLetterReport(table: FrequencyTable): LetterReport {
  return LetterReportSchema.parse({
    kind: 'letters',
    total: totalCount(table),
    counts: LETTERS.map((letter) => ({ letter, count: table.get(letter) ?? 0 })),
  });
}

/**
 * Report with observed digrams, most frequent first.
 *
 * @param table - Digram counts
 * @param limit - Keep only this many pairs (all when omitted)
 */
export function buildDigramReport(table: DigramTable, limit?: number): DigramReport {
  return DigramReportSchema.parse({
    kind: 'digrams',
    total: totalCount(table),
    pairs: topDigrams(table, limit ?? table.size),
  });
}

/**
 * Serialize a report the way it is written to disk or stdout.
 */
export function serializeReport(report: LetterReport | DigramReport): string {
  return JSON.stringify(report, null, 2);
}
