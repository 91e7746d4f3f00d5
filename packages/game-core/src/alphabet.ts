// packages/game-core/src/alphabet.ts
//
// Turns raw letter expressions into letter sets.
//
// Grammar (after lower-casing):
//   expr  := (range | char)*
//   range := "[" X "-" Y "]"     → every character from X to Y inclusive,
//                                   in either direction
//   char  := any other character → itself
//
// Anything outside a–z is dropped after expansion, so digits, whitespace and
// half-written brackets simply disappear. Duplicates keep their first slot.
//
// Example:
//   normalizeLetters('[a-i]k[l-n]') → a b c d e f g h i k l m n
//   normalizeLetters('oy[v-r]')     → o y r s t u v

import { EmptyLetterSetError, InvalidMinLengthError } from './errors.js';

/** Distinct lowercase a–z letters in first-seen order. */
export type LetterSet = readonly string[];

/** Absolute floor for the minimum word length; user input is clamped up to it. */
export const GAME_MIN_WORD_LENGTH = 2;

/** Minimum word length used when the caller does not supply one. */
export const DEFAULT_MIN_WORD_LENGTH = 4;

export type Alphabet = {
  mayUse: LetterSet;
  mustUse: LetterSet;
  /** mayUse followed by the mustUse letters not already in it */
  alphabet: LetterSet;
  minWordLength: number;
  /** non-fatal notices, e.g. a clamped minimum length */
  warnings: string[];
};

const LETTER = /^[a-z]$/;

/**
 * expandLetters lower-cases `raw` and replaces every `[X-Y]` token with the
 * characters it covers. Nothing is filtered yet.
 */
export function expandLetters(raw: string): string {
  const s = raw.toLowerCase();
  let out = '';

  for (let i = 0; i < s.length; i++) {
    if (s[i] === '[' && s[i + 2] === '-' && s[i + 4] === ']') {
      const a = s.charCodeAt(i + 1);
      const b = s.charCodeAt(i + 3);
      const lo = Math.min(a, b);
      const hi = Math.max(a, b);
      for (let c = lo; c <= hi; c++) out += String.fromCharCode(c);
      i += 4;
      continue;
    }
    out += s[i];
  }

  return out;
}

/** Expand, strip non a–z characters, dedupe keeping first occurrence. */
export function normalizeLetters(raw: string): LetterSet {
  const seen = new Set<string>();
  for (const ch of expandLetters(raw)) {
    if (LETTER.test(ch)) seen.add(ch);
  }
  return [...seen];
}

/**
 * parseMinWordLength reads the user's minimum word length.
 *
 * A missing or blank value falls back to DEFAULT_MIN_WORD_LENGTH. Values
 * below GAME_MIN_WORD_LENGTH are clamped with a warning rather than rejected.
 *
 * @throws InvalidMinLengthError when the value is not a positive integer
 */
export function parseMinWordLength(raw: string | undefined): {
  value: number;
  warning?: string;
} {
  if (raw === undefined || raw.trim() === '') {
    return { value: DEFAULT_MIN_WORD_LENGTH };
  }

  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) throw new InvalidMinLengthError(raw);
  const n = Number(trimmed);
  if (!Number.isSafeInteger(n) || n < 1) throw new InvalidMinLengthError(raw);

  if (n < GAME_MIN_WORD_LENGTH) {
    return {
      value: GAME_MIN_WORD_LENGTH,
      warning: `Minimum word length ${n} is below the game minimum; using ${GAME_MIN_WORD_LENGTH}`,
    };
  }
  return { value: n };
}

/**
 * buildAlphabet normalizes both letter expressions and the minimum length.
 *
 * The length is checked first, then may-use, then must-use; the first
 * failure is thrown.
 */
export function buildAlphabet(
  rawMayUse: string,
  rawMustUse: string,
  rawMinWordLength?: string,
): Alphabet {
  const min = parseMinWordLength(rawMinWordLength);

  const mayUse = normalizeLetters(rawMayUse);
  if (mayUse.length === 0) throw new EmptyLetterSetError('may-use');
  const mustUse = normalizeLetters(rawMustUse);
  if (mustUse.length === 0) throw new EmptyLetterSetError('must-use');

  const alphabet = [...new Set([...mayUse, ...mustUse])];

  return {
    mayUse,
    mustUse,
    alphabet,
    minWordLength: min.value,
    warnings: min.warning ? [min.warning] : [],
  };
}
