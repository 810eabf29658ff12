import { Router, type NextFunction, type Request, type Response } from 'express';
import type { DetectionStore } from '../db';
import { config } from '../config';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface StatusResponse {
  last_scan_time: string | null;
  rows_total: number;
  patterns_daily_span_days: number | null;
  version: string;
  database_mode: 'sqlite' | 'memory';
}

export function createMetaRouter(deps: { store: DetectionStore }): Router {
  const router = Router();

  /** GET /v1/meta/status */
  router.get('/status', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const s = await deps.store.status();
      const span =
        s.lastAsOf && s.firstAsOf ? Math.floor((Date.parse(s.lastAsOf) - Date.parse(s.firstAsOf)) / DAY_MS) : null;
      const body: StatusResponse = {
        last_scan_time: s.lastAsOf,
        rows_total: s.total,
        patterns_daily_span_days: span,
        version: config.version,
        database_mode: deps.store.mode
      };
      res.json(body);
    } catch (e) {
      next(e);
    }
  });

  return router;
}
