import { z } from 'zod';

/**
 * Text Schemas
 *
 * Branded string types for normalized cipher text and keys.
 * The brands make sure raw user input never reaches an engine without
 * passing through the normalizer first.
 */

// ============================================
// Normalized Text
// ============================================

/**
 * Uppercase A-Z only, possibly empty.
 */
export const NormalizedTextSchema = z
  .string()
  .regex(/^[A-Z]*$/, 'Normalized text may only contain uppercase letters A-Z')
  .brand<'NormalizedText'>();

export type NormalizedText = z.infer<typeof NormalizedTextSchema>;

// ============================================
// Key
// ============================================

/**
 * A key is normalized text with at least one letter.
 * Every Key is also a NormalizedText.
 */
export const KeySchema = NormalizedTextSchema.refine((text) => text.length > 0, {
  message: 'Key must contain at least one letter',
}).brand<'Key'>();

export type Key = z.infer<typeof KeySchema>;
