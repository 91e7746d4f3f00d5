// packages/game-core/src/words.ts
//
// Built-in fallback word list.
//
// The server streams a real dictionary file (WORDS_FILE / ALT_WORDS_FILE).
// When neither is configured it falls back to this short list, which is also
// handy for exercising the engine without any files.

export const SAMPLE_WORDS: readonly string[] = [
  'Voltage',
  'vote',
  'volt',
  'valet',
  'gavel',
  'gloat',
  'legato',
  'toggle',
  'total',
  'tote',
  'lava',
  'allot',
  'octave',
  'virtuosity',
  'voyeuristic',
  'curiosity',
  'history',
  'story',
  'tryst',
  'apple',
  'banana',
  "vote's",
];
