import { z } from 'zod';
import { LETTERS } from '../ciphers/alphabet.js';

/**
 * Frequency Report Schemas
 *
 * Validates the JSON documents written by `frequency --json`.
 */

// ============================================
// Letter Report
// ============================================

export const LetterSchema = z.enum(LETTERS);

export const LetterCountSchema = z.object({
  letter: LetterSchema,
  count: z.number().int().nonnegative(),
});
export type LetterCount = z.infer<typeof LetterCountSchema>;

/**
 * Single-letter frequency report.
 * `counts` always holds all 26 letters in alphabetical order.
 */
export const LetterReportSchema = z
  .object({
    kind: z.literal('letters'),
    /** Number of letters analyzed */
    total: z.number().int().nonnegative(),
    counts: z.array(LetterCountSchema).length(LETTERS.length),
  })
  .refine(
    (report) => report.counts.reduce((sum, entry) => sum + entry.count, 0) === report.total,
    { message: 'Letter counts must add up to total' }
  );
export type LetterReport = z.infer<typeof LetterReportSchema>;

// ============================================
// Digram Report
// ============================================

export const DigramSchema = z.string().regex(/^[A-Z]{2}$/, 'Digram must be two uppercase letters');

export const DigramCountSchema = z.object({
  digram: DigramSchema,
  count: z.number().int().positive(),
});
export type DigramCount = z.infer<typeof DigramCountSchema>;

/**
 * Digram frequency report. Only observed pairs are listed, and a report
 * limited to the top pairs may list fewer than `total` occurrences.
 */
export const DigramReportSchema = z
  .object({
    kind: z.literal('digrams'),
    /** Number of overlapping pairs analyzed (text length - 1) */
    total: z.number().int().nonnegative(),
    pairs: z.array(DigramCountSchema),
  })
  .refine(
    (report) => report.pairs.reduce((sum, entry) => sum + entry.count, 0) <= report.total,
    { message: 'Digram counts cannot exceed total' }
  );
export type DigramReport = z.infer<typeof DigramReportSchema>;

export type FrequencyReport = LetterReport | DigramReport;
