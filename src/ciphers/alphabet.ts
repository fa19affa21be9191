/**
 * Alphabet & Letter Arithmetic
 *
 * The fixed 26-letter Latin alphabet every cipher and analyzer works over.
 * Letters map to numbers A=0 … Z=25 and all arithmetic is modulo 26.
 */

export const LETTERS = [
  'A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I', 'J', 'K', 'L', 'M',
  'N', 'O', 'P', 'Q', 'R', 'S', 'T', 'U', 'V', 'W', 'X', 'Y', 'Z',
] as const;

export type Letter = (typeof LETTERS)[number];

/** Two adjacent letters, e.g. "TH" */
export type Digram = `${Letter}${Letter}`;

export const ALPHABET_SIZE = LETTERS.length;

const CHAR_CODE_A = 65;

/**
 * Type guard for a single uppercase letter A-Z.
 */
export function isLetter(value: string): value is Letter {
  return /^[A-Z]$/.test(value);
}

/**
 * Position of a letter in the alphabet (A=0 … Z=25).
 */
export function letterToIndex(letter: Letter): number {
  return letter.charCodeAt(0) - CHAR_CODE_A;
}

/**
 * Letter at `index` after reducing it modulo 26.
 * Negative indexes wrap upward, so -1 is Z.
 */
export function indexToLetter(index: number): Letter {
  return LETTERS[mod(index, ALPHABET_SIZE)];
}

/**
 * Euclidean modulo: result is always in `0..divisor-1`.
 */
export function mod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

/** Shift `letter` forward by `shift` places (C = P + K). */
export function addLetters(letter: Letter, shift: Letter): Letter {
  return indexToLetter(letterToIndex(letter) + letterToIndex(shift));
}

/** Shift `letter` backward by `shift` places (P = C - K). */
export function subtractLetters(letter: Letter, shift: Letter): Letter {
  return indexToLetter(letterToIndex(letter) - letterToIndex(shift));
}

/**
 * Every ordered pair of letters, AA through ZZ (676 entries).
 */
export function allDigrams(): Digram[] {
  const digrams: Digram[] = [];
  for (const first of LETTERS) {
    for (const second of LETTERS) {
      digrams.push(`${first}${second}`);
    }
  }
  return digrams;
}
