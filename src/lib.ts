/**
 * Codebreakers Library
 *
 * Public API: text normalization, the Vigenère and columnar transposition
 * engines, frequency analysis, output formatting and the report schemas.
 * Importing this module has no side effects; the CLI lives in index.ts.
 */

export { normalize, isNormalized, toLetters, fromLetters } from './processing/index.js';

export * from './ciphers/index.js';

export * from './analysis/index.js';

export {
  formatGroups,
  renderLetterHistogram,
  renderLetterRanking,
  renderDigramTable,
  renderDigramRanking,
  DEFAULT_GROUP_SIZE,
  DEFAULT_GROUPS_PER_LINE,
  type GroupOptions,
} from './output/format.js';

export { buildLetterReport, buildDigramReport, serializeReport } from './output/report.js';

export * from './schemas/index.js';
