/**
 * Scan API — ручной запуск батч-скана
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import type { BatchScanner } from '../services/batchScanner';
import { getLastSummary, runExclusiveScan } from '../services/scanScheduler';

const MAX_TICKERS = 500;

function parseTickers(body: unknown): string[] | null {
  if (typeof body !== 'object' || body === null || !('tickers' in body)) return null;
  const raw: unknown = body.tickers;
  if (!Array.isArray(raw) || raw.length === 0 || raw.length > MAX_TICKERS) return null;
  const tickers: string[] = [];
  for (const t of raw) {
    if (typeof t !== 'string' || !/^[A-Za-z0-9.\-]{1,12}$/.test(t)) return null;
    tickers.push(t.toUpperCase());
  }
  return tickers;
}

export function createScanRouter(deps: { scanner: BatchScanner; getUniverse: () => string[] }): Router {
  const router = Router();

  /**
   * POST /v1/scan/run
   * Body: { "tickers": ["AAPL", "NVDA"] }; без тела сканируется вся вселенная
   */
  router.post('/run', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const hasTickers = typeof req.body === 'object' && req.body !== null && 'tickers' in req.body;
      const tickers = hasTickers ? parseTickers(req.body) : deps.getUniverse();
      if (!tickers) {
        res.status(400).json({ error: 'tickers must be a non-empty array of symbols' });
        return;
      }
      const summary = await runExclusiveScan(deps.scanner, tickers);
      res.json({ success: true, summary });
    } catch (e) {
      next(e);
    }
  });

  /** GET /v1/scan/last: итог последнего планового скана */
  router.get('/last', (_req: Request, res: Response) => {
    res.json({ summary: getLastSummary() });
  });

  return router;
}
