/**
 * Key Handling
 *
 * Turns a raw keyphrase into a validated Key shared by both ciphers.
 */

import { normalize } from '../processing/normalize.js';
import { KeySchema, type Key } from '../schemas/text.js';
import { InvalidKeyError } from './errors.js';

/**
 * Normalize a keyphrase and make sure something is left of it.
 *
 * "Lemon tree!" becomes "LEMONTREE"; "1234" has no letters and is rejected.
 *
 * @param keyphrase - Raw keyphrase as typed by the user
 * @returns Non-empty normalized key
 * @throws InvalidKeyError if the keyphrase contains no letters
 */
export function createKey(keyphrase: string): Key {
  const parsed = KeySchema.safeParse(normalize(keyphrase));
  if (!parsed.success) {
    throw new InvalidKeyError(
      'Invalid key: key must contain at least one letter A-Z after removing spaces and punctuation'
    );
  }
  return parsed.data;
}
