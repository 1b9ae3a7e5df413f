import express from 'express';
import type pino from 'pino';
import type { SessionStore } from '../core/session_store.js';
import { router, type RouterDeps } from './routes.js';

export interface AppDeps extends RouterDeps {
  readonly store: SessionStore;
}

function resOnFinish(res: express.Response, cb: () => void): void {
  res.on('finish', cb);
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const log: pino.Logger = deps.log;

  // Basic request logging
  app.use((req, res, next) => {
    const start = Date.now();
    log.debug({ method: req.method, path: req.path }, 'req:start');
    resOnFinish(res, () => {
      log.debug({ method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start }, 'req:done');
    });
    next();
  });

  app.get('/healthz', (_req, res) => {
    res.status(200).json({ ok: true, sessions: deps.store.size() });
  });

  app.use('/', router(deps));
  return app;
}
