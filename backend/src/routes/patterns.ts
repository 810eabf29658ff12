/**
 * Patterns API — постраничный список детекций для дашборда
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import type { DetectionStore } from '../db';
import type { VcpDetection } from '../types/detection';
import type { DetectionReader } from '../services/detectionReader';
import { config } from '../config';

export interface PatternItem {
  ticker: string;
  pattern: string;
  as_of: string;
  confidence: number;
  rs: number | null;
  price: number;
  meta: VcpDetection['meta'] & { pivotPrice: number; baseDepthPct: number };
}

export function toPatternItem(d: VcpDetection): PatternItem {
  return {
    ticker: d.ticker,
    pattern: d.pattern,
    as_of: d.asOf,
    confidence: d.confidence,
    rs: d.rs,
    price: d.price,
    meta: { ...d.meta, pivotPrice: d.pivotPrice, baseDepthPct: d.baseDepthPct }
  };
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/** Целое в [1, max]; иначе null */
export function parseLimit(raw: unknown, fallback: number, max: number): number | null {
  const s = queryString(raw);
  if (s === undefined) return fallback;
  if (!/^\d+$/.test(s)) return null;
  const n = parseInt(s, 10);
  return n >= 1 && n <= max ? n : null;
}

export function createPatternsRouter(deps: { reader: DetectionReader; store: DetectionStore }): Router {
  const router = Router();
  const { maxLimit, defaultLimit } = config.pagination;

  /**
   * GET /v1/patterns/all?limit=50&cursor=...
   * Ordered by as_of DESC, ticker ASC. `next` is null on the last page.
   */
  router.get('/all', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const limit = parseLimit(req.query.limit, defaultLimit, maxLimit);
      if (limit === null) {
        res.status(400).json({ error: 'invalid_limit', message: `limit must be an integer in [1, ${maxLimit}]` });
        return;
      }
      const page = await deps.reader.page(queryString(req.query.cursor), limit);
      res.json({
        items: page.items.map(toPatternItem),
        next: page.next,
        has_more: page.hasMore
      });
    } catch (e) {
      next(e);
    }
  });

  /**
   * GET /v1/patterns/:ticker: последние детекции одного тикера
   */
  router.get('/:ticker', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const limit = parseLimit(req.query.limit, 20, maxLimit);
      if (limit === null) {
        res.status(400).json({ error: 'invalid_limit' });
        return;
      }
      const ticker = req.params.ticker.toUpperCase();
      const items = await deps.store.listByTicker(ticker, limit);
      res.json({ ticker, count: items.length, items: items.map(toPatternItem) });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
