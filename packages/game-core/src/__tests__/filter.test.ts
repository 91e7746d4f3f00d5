// packages/game-core/src/__tests__/filter.test.ts
//
// Unit tests for dictionary filtering.
//
// Covered cases:
//   • match rules: length, alphabet membership, must-use presence
//   • special words (whole alphabet used)
//   • source order, duplicates and case-folding
//   • must-use narrowing is monotonic and stops at the first empty step
//   • the streaming filter agrees with the in-memory one

import {
  buildAlphabet,
  filterWordStream,
  filterWords,
  isCandidate,
  isMatch,
  isSpecial,
  narrowByLetter,
  type FilterSpec,
} from '../index.js';

const spec: FilterSpec = buildAlphabet('oavtle', 'g', '4');

async function* lines(words: string[]) {
  for (const w of words) yield w;
}

describe('isMatch / isSpecial', () => {
  const { alphabet, mustUse } = spec;
  const allowed = new Set(alphabet);

  it('requires the minimum length', () => {
    expect(isMatch('gel', allowed, mustUse, 4)).toBe(false);
    expect(isMatch('gala', allowed, mustUse, 4)).toBe(true);
  });

  it('requires every character to be in the alphabet', () => {
    expect(isMatch('apple', allowed, mustUse, 4)).toBe(false);
    expect(isMatch("gavel's", allowed, mustUse, 4)).toBe(false);
  });

  it('requires each must-use letter but not every alphabet letter', () => {
    expect(isMatch('vote', allowed, mustUse, 4)).toBe(false);
    expect(isMatch('toggle', allowed, mustUse, 4)).toBe(true);
  });

  it('leaves must-use letters out of the candidate test', () => {
    expect(isCandidate('vote', allowed, 4)).toBe(true);
    expect(isCandidate('vet', allowed, 4)).toBe(false);
  });

  it('flags words that use the whole alphabet', () => {
    expect(isSpecial('voltage', alphabet)).toBe(true);
    expect(isSpecial('legato', alphabet)).toBe(false); // no v
  });
});

describe('filterWords', () => {
  it('keeps matches in source order and picks out specials', () => {
    const out = filterWords(
      ['Voltage', 'vote', 'gavel', 'gel', 'toggle', "vote's", 'apple'],
      spec,
    );
    expect(out).toEqual({
      kind: 'matched',
      matches: ['voltage', 'gavel', 'toggle'],
      specials: ['voltage'],
    });
  });

  it('keeps duplicates and folds whitespace and case', () => {
    const out = filterWords(['gavel', '  Gavel \r', ''], spec);
    expect(out).toEqual({ kind: 'matched', matches: ['gavel', 'gavel'], specials: [] });
  });

  it('returns no-matches when nothing fits the alphabet', () => {
    expect(filterWords(['apple', 'banana'], spec)).toEqual({ kind: 'no-matches' });
  });

  it('returns no-matches when a must-use letter is never present', () => {
    const z = buildAlphabet('oavtle', 'gz', '4');
    expect(filterWords(['voltage', 'gavel'], z)).toEqual({ kind: 'no-matches' });
  });

  it('stops at the first must-use letter that empties the set', () => {
    const mustUse = ['z', 'g'];
    // reading the second letter would throw
    Object.defineProperty(mustUse, 1, {
      get() {
        throw new Error('read past an empty step');
      },
    });
    const out = filterWords(['voltage', 'gavel'], {
      alphabet: spec.alphabet,
      mustUse,
      minWordLength: 4,
    });
    expect(out).toEqual({ kind: 'no-matches' });
  });
});

describe('narrowByLetter', () => {
  it('only ever shrinks the candidate set', () => {
    const words = ['voltage', 'gavel', 'toggle', 'legato', 'gloat', 'total'];
    let current = words;
    for (const letter of ['g', 'l', 'o', 'v']) {
      const next = narrowByLetter(current, letter);
      expect(next.every((w) => current.includes(w))).toBe(true);
      current = next;
    }
    expect(current).toEqual(['voltage']);
  });
});

describe('filterWordStream', () => {
  const dict = ['Voltage', 'vote', 'gavel', 'gavel', 'toggle', 'apple', ''];

  it('agrees with filterWords', async () => {
    expect(await filterWordStream(lines(dict), spec)).toEqual(filterWords(dict, spec));
  });

  it('keeps exactly the words isMatch accepts', async () => {
    const folded = ['voltage', 'vote', 'gavel', 'gel', 'toggle', 'apple', 'legato'];
    const allowed = new Set(spec.alphabet);
    const out = await filterWordStream(lines(folded), spec);
    expect(out.kind === 'matched' && out.matches).toEqual(['voltage', 'gavel', 'toggle', 'legato']);
    expect(out).toEqual({
      kind: 'matched',
      matches: folded.filter((w) => isMatch(w, allowed, spec.mustUse, spec.minWordLength)),
      specials: ['voltage'],
    });
  });

  it('agrees on an empty result', async () => {
    const z = buildAlphabet('oavtle', 'z', '4');
    expect(await filterWordStream(lines(dict), z)).toEqual({ kind: 'no-matches' });
  });

  it('matches range-built letter sets', async () => {
    const a = buildAlphabet('[a-i]', 'oy[r-v]', '4');
    const out = await filterWordStream(
      lines(['virtuosity', 'voyeuristic', 'curiosity', 'story']),
      a,
    );
    expect(out).toEqual({
      kind: 'matched',
      matches: ['virtuosity', 'voyeuristic'],
      specials: [],
    });
  });
});
