// apps/server/src/config.ts
//
// Environment configuration, validated once at start-up.
//
//   PORT            → HTTP port (default 3001)
//   LOG_LEVEL       → pino level (default "info")
//   WORDS_FILE      → word list for the "default" dialect, one word per line
//   ALT_WORDS_FILE  → word list for the "alternate" dialect
//   MIN_WORD_LENGTH → minimum word length when a request gives none (default 4;
//                     values below the game minimum are clamped)
//
// With no word file configured for a dialect the server falls back to the
// built-in sample list from @hive/game-core.

import { InvalidMinLengthError, parseMinWordLength } from '@hive/game-core';
import { z } from 'zod';

// Same rules as a request's minWordLength; blank means the engine default.
const minWordLength = z
  .string()
  .optional()
  .transform((raw, ctx) => {
    try {
      return String(parseMinWordLength(raw).value);
    } catch (err) {
      if (!(err instanceof InvalidMinLengthError)) throw err;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
      return z.NEVER;
    }
  });

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  WORDS_FILE: z.string().min(1).optional(),
  ALT_WORDS_FILE: z.string().min(1).optional(),
  MIN_WORD_LENGTH: minWordLength,
});

export type Config = {
  port: number;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  wordsFile?: string;
  altWordsFile?: string;
  defaultMinWordLength: string;
};

/** Parse and validate the environment; throws with the zod message if invalid. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.message}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    wordsFile: e.WORDS_FILE,
    altWordsFile: e.ALT_WORDS_FILE,
    defaultMinWordLength: e.MIN_WORD_LENGTH,
  };
}
