// apps/server/src/index.ts
//
// Boots the solver API: loads .env, validates configuration, starts Express.

import 'dotenv/config';

import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';

const config = loadConfig();
const log = createLogger(config.logLevel);
const app = createApp({ config, log });

app.listen(config.port, () => log.info({ port: config.port }, 'server up'));
