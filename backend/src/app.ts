import express, { type Express } from 'express';
import cors from 'cors';
import type { DetectionStore } from './db';
import type { BatchScanner } from './services/batchScanner';
import { DetectionReader } from './services/detectionReader';
import { createPatternsRouter } from './routes/patterns';
import { createMetaRouter } from './routes/meta';
import { createScanRouter } from './routes/scan';
import { errorHandler } from './middleware/errorHandler';
import { config } from './config';

export interface AppDeps {
  store: DetectionStore;
  scanner: BatchScanner;
  getUniverse: () => string[];
  reader?: DetectionReader;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  const reader = deps.reader ?? new DetectionReader(deps.store);

  app.use(config.allowedOrigins.length ? cors({ origin: config.allowedOrigins }) : cors());
  app.use(express.json({ limit: '64kb' }));

  app.use('/v1/patterns', createPatternsRouter({ reader, store: deps.store }));
  app.use('/v1/meta', createMetaRouter({ store: deps.store }));
  app.use('/v1/scan', createScanRouter({ scanner: deps.scanner, getUniverse: deps.getUniverse }));

  app.get('/healthz', (_req, res) => {
    res.json({ ok: true, version: config.version });
  });

  app.get('/readyz', async (_req, res, next) => {
    try {
      const ok = await deps.store.ping();
      res.status(ok ? 200 : 503).json({ ready: ok, database: deps.store.mode });
    } catch (e) {
      next(e);
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'not_found' });
  });
  app.use(errorHandler);

  return app;
}
