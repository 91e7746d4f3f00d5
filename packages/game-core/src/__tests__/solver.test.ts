// packages/game-core/src/__tests__/solver.test.ts
//
// End-to-end tests for the solve pipeline: build → filter → score.

import {
  EmptyLetterSetError,
  InvalidMinLengthError,
  SAMPLE_WORDS,
  solvePuzzle,
  solvePuzzleStream,
} from '../index.js';

describe('solvePuzzle', () => {
  it('solves a puzzle whose only word is special', () => {
    const out = solvePuzzle(
      { mayUse: 'oavtle', mustUse: 'g', minWordLength: '4' },
      ['voltage', 'vote'],
    );

    expect(out).toEqual({
      kind: 'solved',
      alphabet: ['o', 'a', 'v', 't', 'l', 'e', 'g'],
      mayUse: ['o', 'a', 'v', 't', 'l', 'e'],
      mustUse: ['g'],
      minWordLength: 4,
      warnings: [],
      specialWords: ['voltage'],
      specialBonus: 7,
      allWords: ['voltage'],
      scores: [{ word: 'voltage', score: 14, special: true }],
      maxScore: 14,
    });
  });

  it('scores range-built puzzles by length when nothing is special', () => {
    const out = solvePuzzle(
      { mayUse: '[a-i]', mustUse: 'oy[r-v]' },
      ['virtuosity', 'voyeuristic'],
    );

    expect(out.kind).toBe('solved');
    if (out.kind !== 'solved') return;
    expect(out.allWords).toEqual(['virtuosity', 'voyeuristic']);
    expect(out.specialWords).toEqual([]);
    expect(out.maxScore).toBe(10 + 11);
  });

  it('returns no-matches when a must-use letter appears in no word', () => {
    const out = solvePuzzle({ mayUse: 'oavtle', mustUse: 'z' }, SAMPLE_WORDS);
    expect(out).toEqual({
      kind: 'no-matches',
      alphabet: ['o', 'a', 'v', 't', 'l', 'e', 'z'],
      mayUse: ['o', 'a', 'v', 't', 'l', 'e'],
      mustUse: ['z'],
      minWordLength: 4,
      warnings: [],
    });
  });

  it('carries clamping warnings through', () => {
    const out = solvePuzzle({ mayUse: 'ab', mustUse: 'a', minWordLength: '1' }, ['ab', 'a', 'b']);
    expect(out.warnings).toHaveLength(1);
    expect(out.minWordLength).toBe(2);
    if (out.kind !== 'solved') throw new Error('expected a solved puzzle');
    // "ab" sits on the minimum (1) and uses the whole alphabet (+7)
    expect(out.maxScore).toBe(8);
  });

  it('rejects bad input before reading any words', () => {
    const words: Iterable<string> = {
      [Symbol.iterator]() {
        throw new Error('word source was read');
      },
    };
    expect(() => solvePuzzle({ mayUse: '', mustUse: 'g' }, words)).toThrow(EmptyLetterSetError);
    expect(() => solvePuzzle({ mayUse: 'a', mustUse: 'g', minWordLength: 'x' }, words)).toThrow(
      InvalidMinLengthError,
    );
  });
});

describe('solvePuzzleStream', () => {
  async function* lines(words: readonly string[]) {
    for (const w of words) yield w;
  }

  it('matches the in-memory result over the sample list', async () => {
    const req = { mayUse: 'oavtle', mustUse: 'g' };
    expect(await solvePuzzleStream(req, lines(SAMPLE_WORDS))).toEqual(
      solvePuzzle(req, SAMPLE_WORDS),
    );
  });

  it('rejects bad input without pulling a line', async () => {
    let pulled = 0;
    async function* counting() {
      pulled++;
      yield 'voltage';
    }
    await expect(
      solvePuzzleStream({ mayUse: 'abc', mustUse: '123' }, counting()),
    ).rejects.toThrow(EmptyLetterSetError);
    expect(pulled).toBe(0);
  });
});
