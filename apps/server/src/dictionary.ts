// apps/server/src/dictionary.ts
//
// Word-source selection and line streaming.
//
// Each dialect maps to an optional word file:
//   "default"   → WORDS_FILE
//   "alternate" → ALT_WORDS_FILE
//
// A configured file that is missing is an error (503 at the HTTP layer); an
// unconfigured dialect falls back to the built-in SAMPLE_WORDS list. Files
// are read line by line and never held in memory as a whole.

import fs from 'node:fs';
import readline from 'node:readline';

import { HiveError, SAMPLE_WORDS } from '@hive/game-core';
import type { Dialect } from '@hive/protocol';

import type { Config } from './config.js';

export type WordSource = { kind: 'file'; path: string } | { kind: 'builtin' };

export type DictionaryConfig = Pick<Config, 'wordsFile' | 'altWordsFile'>;

export class DictionaryUnavailableError extends HiveError {
  readonly path: string;

  constructor(path: string) {
    super('DICTIONARY_UNAVAILABLE', `Word list not found: ${path}`);
    this.path = path;
  }
}

export function resolveWordSource(config: DictionaryConfig, dialect: Dialect): WordSource {
  const path = dialect === 'alternate' ? config.altWordsFile : config.wordsFile;
  if (!path) return { kind: 'builtin' };
  if (!fs.existsSync(path)) throw new DictionaryUnavailableError(path);
  return { kind: 'file', path };
}

/** Lines of the given source, one word per line. */
export async function* streamWords(source: WordSource): AsyncGenerator<string> {
  if (source.kind === 'builtin') {
    yield* SAMPLE_WORDS;
    return;
  }

  const input = fs.createReadStream(source.path, { encoding: 'utf8' });
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  try {
    yield* rl;
  } finally {
    rl.close();
    input.destroy();
  }
}

/**
 * Words for a dialect. Nothing is resolved or opened until the first line is
 * requested, so a solve that fails on its input never touches the file.
 */
export async function* dialectWords(
  config: DictionaryConfig,
  dialect: Dialect,
): AsyncGenerator<string> {
  yield* streamWords(resolveWordSource(config, dialect));
}
