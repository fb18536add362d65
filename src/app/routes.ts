import type { Express } from 'express';
import express from 'express';
import { makeBearerAuth } from './middleware/auth.js';
import { logger } from '../utils/logger.js';
import { toPersisted } from '../domain/progress.js';
import type { VersePoster } from '../scheduler/versePoster.js';
import type { ProgressStore } from '../scheduler/types.js';

export type RouteDeps = {
  poster: VersePoster;
  store: ProgressStore;
  operatorToken: string;
};

export function registerRoutes(app: Express, deps: RouteDeps): void {
  const operatorAuth = makeBearerAuth(deps.operatorToken);

  app.get('/health', (_req, res) => {
    res.status(200).json({ ok: true, ts: Date.now() });
  });

  app.get('/status', async (_req, res) => {
    try {
      const record = await deps.store.load();
      res.status(200).json({ ok: true, progress: record ? toPersisted(record) : null });
    } catch (err) {
      logger.warn('status_failed', { err: String(err) });
      res.status(500).json({ ok: false, error: 'status_failed' });
    }
  });

  // Trigger for webhook-style schedulers; each call is one posting cycle.
  app.post('/run', operatorAuth, async (_req, res) => {
    const outcome = await deps.poster.runOnce();
    logger.info('run_triggered_via_http', { status: outcome.status });
    res.status(outcome.status === 'failed' ? 502 : 200).json(outcome);
  });
}

export function createApp(deps: RouteDeps): Express {
  const app = express();
  registerRoutes(app, deps);
  return app;
}
