// packages/game-core/src/filter.ts
//
// Selects the dictionary words playable with a given alphabet.
//
// A word is a match when:
//   • it is at least minWordLength characters long,
//   • every character belongs to the alphabet (repeats are free),
//   • it contains each must-use letter at least once.
//
// A match is "special" when it contains every alphabet letter, may-use and
// must-use alike.
//
// Two entry points share these rules:
//   • filterWords      → in-memory source; narrows the candidates one
//                        must-use letter at a time and stops as soon as
//                        nothing is left.
//   • filterWordStream → line-by-line source; one combined test per word.
//
// Source order and duplicates are preserved. Words are trimmed and
// lower-cased before testing; blank lines are skipped.

import type { LetterSet } from './alphabet.js';

export type FilterSpec = {
  alphabet: LetterSet;
  mustUse: LetterSet;
  minWordLength: number;
};

export type FilterOutcome =
  | { kind: 'matched'; matches: string[]; specials: string[] }
  | { kind: 'no-matches' };

/** Case-fold a raw dictionary line; null for blank lines. */
export function foldWord(line: string): string | null {
  const w = line.trim().toLowerCase();
  return w.length > 0 ? w : null;
}

function fitsAlphabet(word: string, allowed: ReadonlySet<string>): boolean {
  for (const ch of word) {
    if (!allowed.has(ch)) return false;
  }
  return true;
}

function containsAll(word: string, letters: Iterable<string>): boolean {
  for (const l of letters) {
    if (!word.includes(l)) return false;
  }
  return true;
}

/** Length and alphabet test; must-use letters are checked separately. */
export function isCandidate(
  word: string,
  allowed: ReadonlySet<string>,
  minWordLength: number,
): boolean {
  return word.length >= minWordLength && fitsAlphabet(word, allowed);
}

/**
 * Full match test for an already folded word.
 *
 * @param allowed - the alphabet as a set, built once per filter run
 */
export function isMatch(
  word: string,
  allowed: ReadonlySet<string>,
  mustUse: LetterSet,
  minWordLength: number,
): boolean {
  return isCandidate(word, allowed, minWordLength) && containsAll(word, mustUse);
}

/** True when the word uses every alphabet letter at least once. */
export function isSpecial(word: string, alphabet: LetterSet): boolean {
  return containsAll(word, alphabet);
}

/** Keep only the candidates that contain `letter`. */
export function narrowByLetter(candidates: readonly string[], letter: string): string[] {
  return candidates.filter((w) => w.includes(letter));
}

function collect(matches: string[], alphabet: LetterSet): FilterOutcome {
  if (matches.length === 0) return { kind: 'no-matches' };
  const specials = matches.filter((w) => isSpecial(w, alphabet));
  return { kind: 'matched', matches, specials };
}

/**
 * filterWords runs the length/alphabet pass over the whole source, then
 * intersects the survivors with each must-use letter in turn.
 *
 * @returns { kind: 'no-matches' } as soon as any step leaves nothing
 */
export function filterWords(words: Iterable<string>, spec: FilterSpec): FilterOutcome {
  const allowed = new Set(spec.alphabet);

  let candidates: string[] = [];
  for (const line of words) {
    const w = foldWord(line);
    if (w !== null && isCandidate(w, allowed, spec.minWordLength)) candidates.push(w);
  }
  if (candidates.length === 0) return { kind: 'no-matches' };

  for (const letter of spec.mustUse) {
    candidates = narrowByLetter(candidates, letter);
    if (candidates.length === 0) return { kind: 'no-matches' };
  }

  return collect(candidates, spec.alphabet);
}

/**
 * filterWordStream tests each line as it arrives, so the source is never
 * held in memory. Same result as filterWords.
 */
export async function filterWordStream(
  words: AsyncIterable<string>,
  spec: FilterSpec,
): Promise<FilterOutcome> {
  const allowed = new Set(spec.alphabet);
  const matches: string[] = [];

  for await (const line of words) {
    const w = foldWord(line);
    if (w !== null && isMatch(w, allowed, spec.mustUse, spec.minWordLength)) matches.push(w);
  }

  return collect(matches, spec.alphabet);
}
