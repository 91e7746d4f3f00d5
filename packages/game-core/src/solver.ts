// packages/game-core/src/solver.ts
//
// The full pipeline: build the alphabet, filter a word source, score.
//
// Input errors (bad length, empty letter set) are thrown by buildAlphabet
// before the word source is read. An empty filter result comes back as a
// "no-matches" outcome.

import { buildAlphabet, type LetterSet } from './alphabet.js';
import {
  filterWords,
  filterWordStream,
  type FilterOutcome,
} from './filter.js';
import { scoreMatches, type WordScore } from './scoring.js';

export type SolveRequest = {
  mayUse: string;
  mustUse: string;
  minWordLength?: string;
};

type PuzzleSummary = {
  alphabet: LetterSet;
  mayUse: LetterSet;
  mustUse: LetterSet;
  minWordLength: number;
  warnings: string[];
};

export type SolvedPuzzle = PuzzleSummary & {
  kind: 'solved';
  specialWords: string[];
  specialBonus: number;
  allWords: string[];
  scores: WordScore[];
  maxScore: number;
};

export type UnsolvedPuzzle = PuzzleSummary & { kind: 'no-matches' };

export type SolveOutcome = SolvedPuzzle | UnsolvedPuzzle;

function finish(summary: PuzzleSummary, outcome: FilterOutcome): SolveOutcome {
  if (outcome.kind === 'no-matches') return { ...summary, kind: 'no-matches' };

  const totals = scoreMatches(outcome.matches, outcome.specials, summary.minWordLength);
  return {
    ...summary,
    kind: 'solved',
    specialWords: outcome.specials,
    specialBonus: totals.specialBonus,
    allWords: outcome.matches,
    scores: totals.perWord,
    maxScore: totals.maxScore,
  };
}

export function solvePuzzle(req: SolveRequest, words: Iterable<string>): SolveOutcome {
  const summary = buildAlphabet(req.mayUse, req.mustUse, req.minWordLength);
  return finish(summary, filterWords(words, summary));
}

/** Same as solvePuzzle for a line stream, e.g. a dictionary file. */
export async function solvePuzzleStream(
  req: SolveRequest,
  words: AsyncIterable<string>,
): Promise<SolveOutcome> {
  const summary = buildAlphabet(req.mayUse, req.mustUse, req.minWordLength);
  return finish(summary, await filterWordStream(words, summary));
}
