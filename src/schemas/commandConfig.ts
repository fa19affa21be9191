import { z } from 'zod';

/**
 * Command Configuration Schema
 *
 * Validates the fully resolved configuration a CLI command runs with.
 */

// ============================================
// Command Selection
// ============================================

export const CipherNameSchema = z.enum(['vigenere', 'vigenere-autokey', 'transposition']);
export type CipherName = z.infer<typeof CipherNameSchema>;

export const DirectionSchema = z.enum(['encipher', 'decipher']);
export type Direction = z.infer<typeof DirectionSchema>;

export const AnalysisKindSchema = z.enum(['letters', 'digrams']);
export type AnalysisKind = z.infer<typeof AnalysisKindSchema>;

// ============================================
// Output Settings
// ============================================

export const OutputSettingsSchema = z.object({
  /** Letters per group, 0 disables grouping */
  groupSize: z.number().int().nonnegative(),

  /** Groups per output line */
  groupsPerLine: z.number().int().positive(),

  /** Write to this file instead of stdout */
  outputPath: z.string().min(1).optional(),

  /** Emit detailed progress on stderr */
  verbose: z.boolean(),
});
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;

// ============================================
// Command Config
// ============================================

const InputSchema = z.object({
  /** Read from this file, stdin when absent */
  inputPath: z.string().min(1).optional(),
});

export const CipherCommandConfigSchema = OutputSettingsSchema.merge(InputSchema).extend({
  command: z.literal('cipher'),
  cipher: CipherNameSchema,
  direction: DirectionSchema,
  /** Raw keyphrase; normalized by the engines. Absent until resolved. */
  key: z.string().optional(),
});
export type CipherCommandConfig = z.infer<typeof CipherCommandConfigSchema>;

export const FrequencyCommandConfigSchema = OutputSettingsSchema.merge(InputSchema).extend({
  command: z.literal('frequency'),
  analysis: AnalysisKindSchema,
  /** Show only the most frequent entries, in ranked order */
  top: z.number().int().positive().optional(),
  /** Emit a JSON report instead of a text table */
  json: z.boolean(),
});
export type FrequencyCommandConfig = z.infer<typeof FrequencyCommandConfigSchema>;

export const CommandConfigSchema = z.discriminatedUnion('command', [
  CipherCommandConfigSchema,
  FrequencyCommandConfigSchema,
]);
export type CommandConfig = z.infer<typeof CommandConfigSchema>;
