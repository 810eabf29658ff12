import type { Server } from 'http';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createApp } from './app';
import { MemoryDetectionStore } from './db';
import { BatchScanner } from './services/batchScanner';
import type { CandleSeriesProvider } from './services/candleProvider';
import { FetchError } from './lib/errors';
import { makeDetection, vcpSeries } from './test/series';

const provider: CandleSeriesProvider = {
  name: 'fake',
  fetch: async (ticker) => {
    if (ticker === 'VCPX') return vcpSeries();
    throw new FetchError(ticker, 'unknown ticker');
  }
};

async function json(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  if (typeof body !== 'object' || body === null) throw new Error('expected a JSON object');
  return { ...body };
}

describe('HTTP API', () => {
  const store = new MemoryDetectionStore();
  const scanner = new BatchScanner({ provider, store }, { retryBaseDelayMs: 1, sleep: async () => {} });
  let server: Server;
  let base = '';

  beforeAll(async () => {
    await store.upsert(makeDetection('AAA', '2024-03-01'));
    await store.upsert(makeDetection('BBB', '2024-03-01', { rs: null }));
    await store.upsert(makeDetection('CCC', '2024-02-20'));
    const app = createApp({ store, scanner, getUniverse: () => ['VCPX'] });
    await new Promise<void>((resolve) => {
      server = app.listen(0, () => resolve());
    });
    const address = server.address();
    if (address && typeof address === 'object') base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  it('pages through all patterns', async () => {
    const res = await fetch(`${base}/v1/patterns/all?limit=2`);
    expect(res.status).toBe(200);
    const body = await json(res);
    expect(body).toMatchObject({
      has_more: true,
      items: [
        {
          ticker: 'AAA',
          pattern: 'VCP',
          as_of: '2024-03-01T00:00:00.000Z',
          confidence: 0.8,
          rs: 75,
          price: 99,
          meta: { pivotPrice: 100, baseDepthPct: 30, triggered: false }
        },
        { ticker: 'BBB', rs: null }
      ]
    });

    const cursor = body.next;
    expect(typeof cursor).toBe('string');
    if (typeof cursor !== 'string') return;
    const page2 = await json(await fetch(`${base}/v1/patterns/all?limit=2&cursor=${encodeURIComponent(cursor)}`));
    expect(page2).toMatchObject({ items: [{ ticker: 'CCC' }], next: null, has_more: false });
  });

  it('rejects an invalid cursor with 400', async () => {
    const res = await fetch(`${base}/v1/patterns/all?cursor=garbage`);
    expect(res.status).toBe(400);
    expect(await json(res)).toMatchObject({ error: 'invalid_cursor' });
  });

  it('rejects an invalid limit with 400', async () => {
    expect((await fetch(`${base}/v1/patterns/all?limit=0`)).status).toBe(400);
    expect((await fetch(`${base}/v1/patterns/all?limit=abc`)).status).toBe(400);
    expect((await fetch(`${base}/v1/patterns/all?limit=201`)).status).toBe(400);
  });

  it('lists detections for one ticker', async () => {
    const res = await fetch(`${base}/v1/patterns/ccc`);
    expect(await json(res)).toMatchObject({
      ticker: 'CCC',
      count: 1,
      items: [{ as_of: '2024-02-20T00:00:00.000Z' }]
    });
  });

  it('reports status', async () => {
    const res = await fetch(`${base}/v1/meta/status`);
    expect(await json(res)).toEqual({
      last_scan_time: '2024-03-01T00:00:00.000Z',
      rows_total: 3,
      patterns_daily_span_days: 10,
      version: '0.1.0',
      database_mode: 'memory'
    });
  });

  it('answers health checks', async () => {
    expect((await fetch(`${base}/healthz`)).status).toBe(200);
    const ready = await fetch(`${base}/readyz`);
    expect(ready.status).toBe(200);
    expect(await json(ready)).toEqual({ ready: true, database: 'memory' });
  });

  it('runs a scan on demand', async () => {
    const res = await fetch(`${base}/v1/scan/run`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ tickers: ['vcpx', 'NOPE'] })
    });
    expect(res.status).toBe(200);
    expect(await json(res)).toMatchObject({ success: true, summary: { total: 2, detected: 1, skipped: 1 } });
    expect((await store.listByTicker('VCPX', 5)).length).toBe(1);
  });

  it('reports the on-demand run as the last scan', async () => {
    const res = await fetch(`${base}/v1/scan/last`);
    expect(await json(res)).toMatchObject({ summary: { total: 2, detected: 1, skipped: 1 } });
  });

  it('answers 400 to a malformed JSON body', async () => {
    const res = await fetch(`${base}/v1/scan/run`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"tickers": ['
    });
    expect(res.status).toBe(400);
    expect(await json(res)).toEqual({ error: 'invalid_json' });
  });

  it('validates the scan request body', async () => {
    const res = await fetch(`${base}/v1/scan/run`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ tickers: 5 })
    });
    expect(res.status).toBe(400);
  });

  it('returns 404 for unknown routes', async () => {
    expect((await fetch(`${base}/v2/nothing`)).status).toBe(404);
  });
});
