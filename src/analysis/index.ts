/**
 * Analysis Module Exports
 */

import { normalize } from '../processing/normalize.js';
import type { AnalysisKind } from '../schemas/commandConfig.js';
import {
  digramFrequency,
  letterFrequency,
  type DigramTable,
  type FrequencyTable,
} from './frequency.js';

export {
  letterFrequency,
  digramFrequency,
  digramCount,
  totalCount,
  rankLetters,
  topDigrams,
  type FrequencyTable,
  type DigramTable,
  type RankedLetter,
  type RankedDigram,
} from './frequency.js';

export type AnalysisResult =
  | { kind: 'letters'; table: FrequencyTable }
  | { kind: 'digrams'; table: DigramTable };

/**
 * Normalize raw input and count letters or digrams.
 */
export function analyze(kind: AnalysisKind, raw: string | Uint8Array): AnalysisResult {
  const text = normalize(raw);
  return kind === 'letters'
    ? { kind, table: letterFrequency(text) }
    : { kind, table: digramFrequency(text) };
}
