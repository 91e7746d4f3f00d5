// apps/server/src/logger.ts
//
// pino logger shared by the app and the boot script.

import pino, { type LevelWithSilent, type Logger } from 'pino';

export type { Logger };

export function createLogger(level: LevelWithSilent): Logger {
  return pino({ level });
}
