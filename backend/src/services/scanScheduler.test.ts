import { describe, it, expect } from 'vitest';
import { runExclusiveScan, runScheduledScan, getLastSummary, isScanRunning } from './scanScheduler';
import { ScanInProgress } from '../lib/errors';
import { BatchScanner } from './batchScanner';
import { MemoryDetectionStore } from '../db';
import type { CandleSeriesProvider } from './candleProvider';
import { makeDetection, vcpSeries } from '../test/series';

const provider: CandleSeriesProvider = {
  name: 'fake',
  fetch: async () => vcpSeries()
};

describe('scanScheduler', () => {
  it('scans, records the summary and prunes old detections', async () => {
    const store = new MemoryDetectionStore();
    await store.upsert(makeDetection('OLD', '2001-01-02'));
    const scanner = new BatchScanner({ provider, store }, { sleep: async () => {} });
    const seen: number[] = [];

    const summary = await runScheduledScan({
      scanner,
      store,
      getTickers: () => ['VCPX'],
      intervalMs: 60_000,
      retentionDays: 730,
      onSummary: (s) => seen.push(s.detected)
    });

    expect(summary?.detected).toBe(1);
    expect(seen).toEqual([1]);
    expect(getLastSummary()).toBe(summary);
    expect(isScanRunning()).toBe(false);
    expect((await store.listByTicker('OLD', 1))).toEqual([]);
  });

  it('drops a tick while a scan is in flight', async () => {
    const store = new MemoryDetectionStore();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const slow: CandleSeriesProvider = {
      name: 'slow',
      fetch: async () => {
        await gate;
        return vcpSeries();
      }
    };
    const scanner = new BatchScanner({ provider: slow, store }, { sleep: async () => {} });
    const options = { scanner, store, getTickers: () => ['VCPX'], intervalMs: 60_000 };

    const first = runScheduledScan(options);
    expect(isScanRunning()).toBe(true);
    expect(await runScheduledScan(options)).toBeNull();
    await expect(runExclusiveScan(scanner, ['VCPX'])).rejects.toBeInstanceOf(ScanInProgress);
    release();
    expect((await first)?.detected).toBe(1);
  });

  it('swallows a failed scan and reports null', async () => {
    const store = new MemoryDetectionStore();
    const scanner = new BatchScanner({ provider, store }, { sleep: async () => {} });
    const result = await runScheduledScan({
      scanner,
      store,
      getTickers: () => {
        throw new Error('universe unreadable');
      },
      intervalMs: 60_000
    });
    expect(result).toBeNull();
    expect(isScanRunning()).toBe(false);
  });

  it('records on-demand runs as the last summary', async () => {
    const store = new MemoryDetectionStore();
    const scanner = new BatchScanner({ provider, store }, { sleep: async () => {} });
    const summary = await runExclusiveScan(scanner, ['AAA', 'BBB']);
    expect(summary.total).toBe(2);
    expect(getLastSummary()).toBe(summary);
    expect(isScanRunning()).toBe(false);
  });
});
