import express, { type Express } from 'express';
import type { Rng } from '@noughts/engine';
import type { AppConfig } from './config.js';
import { errorHandler, notFound } from './errors.js';
import type { Logger } from './logger.js';
import { createGameRouter } from './routes/game.js';
import { sessionMiddleware } from './session/middleware.js';
import type { SessionStore } from './session/store.js';

export interface AppDeps {
  config: Pick<AppConfig, 'maxBodyBytes'>;
  store: SessionStore;
  logger: Logger;
  rng?: Rng;
}

export function createApp({ config, store, logger, rng }: AppDeps): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: config.maxBodyBytes }));

  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.use(
    '/api/game',
    sessionMiddleware(),
    createGameRouter({ store, rng, logger: logger.child('game') })
  );

  app.use(notFound());
  app.use(errorHandler(logger.child('http')));
  return app;
}
