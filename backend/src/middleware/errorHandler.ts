import type { NextFunction, Request, Response } from 'express';
import { InvalidCursor, ScanInProgress, ScannerError, StoreError, errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';

/** 4xx from body-parser (malformed JSON, oversized body) */
function clientStatus(err: unknown): { status: number; type: string } | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  const status = err.status;
  if (typeof status !== 'number' || status < 400 || status >= 500) return null;
  const type = 'type' in err && typeof err.type === 'string' ? err.type : 'bad_request';
  return { status, type };
}

/**
 * Central error handler: client errors → 4xx, store outages → 503.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof InvalidCursor) {
    res.status(400).json({ error: 'invalid_cursor', message: err.message });
    return;
  }
  if (err instanceof ScanInProgress) {
    res.status(409).json({ error: 'scan_in_progress', message: err.message });
    return;
  }
  if (err instanceof StoreError) {
    logger.error('HTTP', `${req.method} ${req.path} store error`, { error: err.message });
    res.status(503).json({ error: 'store_unavailable' });
    return;
  }
  if (err instanceof ScannerError) {
    logger.warn('HTTP', `${req.method} ${req.path} ${err.code}`, { error: err.message });
    res.status(422).json({ error: err.code.toLowerCase(), message: err.message });
    return;
  }
  const client = clientStatus(err);
  if (client) {
    res.status(client.status).json({
      error: client.type === 'entity.parse.failed' ? 'invalid_json' : client.type.replace(/\./g, '_')
    });
    return;
  }
  logger.error('HTTP', `${req.method} ${req.path} failed`, { error: errorMessage(err) });
  res.status(500).json({ error: 'internal_error' });
}
