// packages/protocol/src/index.ts
//
// Shared protocol definitions for the solver API.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - Dialect: which dictionary to solve against ("default", "alternate").
//   - Request/response shapes for solving a puzzle.
//   - The error body returned for rejected input.
//
// The server validates requests with these schemas and parses its own
// responses through them before sending, so clients can rely on the shapes.

import { z } from 'zod';

/**
 * Dialect schema:
 *  - "default"   → the primary word list (WORDS_FILE)
 *  - "alternate" → the secondary word list (ALT_WORDS_FILE)
 */
export const dialectSchema = z.enum(['default', 'alternate']);
export type Dialect = z.infer<typeof dialectSchema>;

export const formatSchema = z.enum(['json', 'text']);
export type Format = z.infer<typeof formatSchema>;

/* -------------------------------------------------------------------------- */
/*                               /solve endpoint                              */
/* -------------------------------------------------------------------------- */

/**
 * Request to solve a puzzle.
 *  - mayUse:        letter expression, e.g. "oavtle" or "[a-i]"
 *  - mustUse:       letter expression, e.g. "g" or "oy[r-v]"
 *                   (emptiness is left to the engine, which names the side)
 *  - minWordLength: optional; a number or a numeric string. Passed on as a
 *                   string so the engine applies its own parsing and clamping.
 *  - dialect:       which word list, defaults to "default"
 *  - format:        "json" (structured) or "text" (report lines)
 *  - showAlphabet:  include the letter-set summary in text reports
 */
export const solveReq = z.object({
  mayUse: z.string(),
  mustUse: z.string(),
  minWordLength: z
    .union([z.string(), z.number()])
    .transform((v) => String(v))
    .optional(),
  dialect: dialectSchema.default('default'),
  format: formatSchema.default('json'),
  showAlphabet: z.boolean().default(true),
});
export type SolveReq = z.infer<typeof solveReq>;

const letters = z.array(z.string().regex(/^[a-z]$/));

const puzzleSummary = z.object({
  solveId: z.string(),
  alphabet: letters,
  mayUse: letters,
  mustUse: letters,
  minWordLength: z.number().int().min(1),
  warnings: z.array(z.string()),
});

/**
 * Response to /solve:
 *  - kind "solved":     specials, bonus subtotal, every match with its score,
 *                       and the maximum achievable score
 *  - kind "no-matches": the dictionary has no playable word
 */
export const solveRes = z.discriminatedUnion('kind', [
  puzzleSummary.extend({
    kind: z.literal('solved'),
    specialWords: z.array(z.string()),
    specialBonus: z.number().int().min(0),
    allWords: z.array(z.string()),
    scores: z.array(
      z.object({
        word: z.string(),
        score: z.number().int().min(0),
        special: z.boolean(),
      }),
    ),
    maxScore: z.number().int().min(0),
  }),
  puzzleSummary.extend({ kind: z.literal('no-matches') }),
]);
export type SolveRes = z.infer<typeof solveRes>;

/* -------------------------------------------------------------------------- */
/*                                   Errors                                   */
/* -------------------------------------------------------------------------- */

/**
 * Error body:
 *  - error:   machine-readable code (e.g. "EMPTY_LETTER_SET")
 *  - message: human-readable description
 *  - side:    which letter set was empty, for EMPTY_LETTER_SET
 */
export const errorRes = z.object({
  error: z.string(),
  message: z.string(),
  side: z.enum(['may-use', 'must-use']).optional(),
});
export type ErrorRes = z.infer<typeof errorRes>;
