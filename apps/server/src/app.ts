// apps/server/src/app.ts
//
// Express application for the solver API.
//
// Routes:
//   GET  /api/health → liveness probe
//   POST /api/solve  → solve a puzzle against the dialect's word list
//
// Responsibilities:
//   • Validate request bodies with the shared zod schemas (@hive/protocol).
//   • Stream the selected dictionary through the engine (@hive/game-core).
//   • Map engine and dictionary errors to HTTP status codes.
//
// No state is kept between requests.

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { nanoid } from 'nanoid';

import {
  EmptyLetterSetError,
  InvalidMinLengthError,
  formatReport,
  solvePuzzleStream,
} from '@hive/game-core';
import { errorRes, solveReq, solveRes, type ErrorRes } from '@hive/protocol';

import type { Config } from './config.js';
import { DictionaryUnavailableError, dialectWords } from './dictionary.js';
import type { Logger } from './logger.js';

export type AppDeps = {
  config: Pick<Config, 'wordsFile' | 'altWordsFile' | 'defaultMinWordLength'>;
  log: Logger;
};

/** The 4xx status carried by body-parser's http-errors, if any. */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function createApp({ config, log }: AppDeps) {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  /* ------------------------------------------------------------------------ */
  /*                                  Solve                                   */
  /* ------------------------------------------------------------------------ */
  async function solve(req: Request, res: Response) {
    const parsed = solveReq.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.format());
    const { mayUse, mustUse, minWordLength, dialect, format, showAlphabet } = parsed.data;

    const solveId = nanoid();
    const outcome = await solvePuzzleStream(
      { mayUse, mustUse, minWordLength: minWordLength ?? config.defaultMinWordLength },
      dialectWords(config, dialect),
    );

    for (const warning of outcome.warnings) log.warn({ solveId }, warning);
    log.info(
      {
        solveId,
        dialect,
        alphabet: outcome.alphabet.join(''),
        matches: outcome.kind === 'solved' ? outcome.allWords.length : 0,
        maxScore: outcome.kind === 'solved' ? outcome.maxScore : 0,
      },
      'puzzle solved',
    );

    if (format === 'text') {
      const lines = formatReport(outcome, { showAlphabet });
      return res.type('text/plain').send(`${lines.join('\n')}\n`);
    }
    return res.json(solveRes.parse({ solveId, ...outcome }));
  }

  app.post('/api/solve', (req, res, next) => {
    solve(req, res).catch(next);
  });

  /* ------------------------------------------------------------------------ */
  /*                                  Errors                                  */
  /* ------------------------------------------------------------------------ */
  const fail = (res: Response, status: number, body: ErrorRes) =>
    res.status(status).json(errorRes.parse(body));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof EmptyLetterSetError) {
      return fail(res, 400, { error: err.code, message: err.message, side: err.side });
    }
    if (err instanceof InvalidMinLengthError) {
      return fail(res, 400, { error: err.code, message: err.message });
    }
    if (err instanceof SyntaxError) {
      // malformed JSON body from express.json()
      return fail(res, 400, { error: 'INVALID_JSON', message: err.message });
    }
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      // e.g. 413 body too large, 415 unsupported charset
      const message = err instanceof Error ? err.message : 'Request rejected';
      return fail(res, status, { error: 'REQUEST_REJECTED', message });
    }
    if (err instanceof DictionaryUnavailableError) {
      log.error({ path: err.path }, 'word list unavailable');
      return fail(res, 503, { error: err.code, message: err.message });
    }
    log.error({ err }, 'solve failed');
    return fail(res, 500, { error: 'INTERNAL', message: 'Internal server error' });
  });

  return app;
}
