// packages/game-core/src/scoring.ts
//
// Spelling-bee scoring, shared by the solver and the report.
//
// Rules (min = active minimum word length):
//   • shorter than min   → 0
//   • exactly min        → 1
//   • longer than min    → one point per letter
//   • special words earn a flat SPECIAL_BONUS on top of their length score.
//
// The maximum score for a puzzle is the sum over every match plus one bonus
// per special word. Special words stay in the regular list, so they are
// counted under both rules.

export const SPECIAL_BONUS = 7;

export type WordScore = { word: string; score: number; special: boolean };

export type ScoreSummary = {
  perWord: WordScore[];
  /** SPECIAL_BONUS × number of special words */
  specialBonus: number;
  maxScore: number;
};

/**
 * scoreWord returns the length-based score of a word.
 *
 * Example (min = 4):
 *   "vet" → 0, "vote" → 1, "votes" → 5
 */
export function scoreWord(word: string, minWordLength: number): number {
  if (word.length < minWordLength) return 0;
  if (word.length === minWordLength) return 1;
  return word.length;
}

/** Length score plus the bonus when the word is special. */
export function scoreMatch(word: string, minWordLength: number, special: boolean): number {
  return scoreWord(word, minWordLength) + (special ? SPECIAL_BONUS : 0);
}

/**
 * scoreMatches totals a filter result.
 *
 * @param matches  - every matching word, in source order
 * @param specials - the subset of matches that use the whole alphabet
 */
export function scoreMatches(
  matches: readonly string[],
  specials: readonly string[],
  minWordLength: number,
): ScoreSummary {
  const special = new Set(specials);
  const perWord = matches.map((word) => ({
    word,
    score: scoreMatch(word, minWordLength, special.has(word)),
    special: special.has(word),
  }));

  let base = 0;
  for (const w of matches) base += scoreWord(w, minWordLength);
  const specialBonus = SPECIAL_BONUS * specials.length;

  return { perWord, specialBonus, maxScore: base + specialBonus };
}
