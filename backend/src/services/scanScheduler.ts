/**
 * Scan Scheduler — периодический батч-скан вселенной и очистка старых детекций
 */

import type { BatchScanner, BatchSummary } from './batchScanner';
import type { DetectionStore } from '../db';
import { ScanInProgress, errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

export type OnBatchSummary = (summary: BatchSummary) => void;

export interface ScanSchedulerOptions {
  scanner: BatchScanner;
  store: DetectionStore;
  getTickers: () => string[];
  intervalMs: number;
  runOnStart?: boolean;
  retentionDays?: number;
  onSummary?: OnBatchSummary;
}

let intervalId: ReturnType<typeof setInterval> | null = null;
let running = false;
let lastSummary: BatchSummary | null = null;

/**
 * Run a batch unless another one is in flight (scheduled or on demand).
 * Throws ScanInProgress on overlap; records the summary on success.
 */
export async function runExclusiveScan(scanner: BatchScanner, tickers: string[]): Promise<BatchSummary> {
  if (running) throw new ScanInProgress();
  running = true;
  try {
    const summary = await scanner.run(tickers);
    lastSummary = summary;
    return summary;
  } finally {
    running = false;
  }
}

/**
 * One scheduled tick: batch scan, then retention. A tick that starts while the
 * previous one is still running is dropped.
 */
export async function runScheduledScan(options: ScanSchedulerOptions): Promise<BatchSummary | null> {
  if (running) {
    logger.warn('ScanScheduler', 'Previous scan still running, tick skipped');
    return null;
  }
  try {
    const summary = await runExclusiveScan(options.scanner, options.getTickers());
    options.onSummary?.(summary);
    if (options.retentionDays && options.retentionDays > 0) {
      const before = new Date(Date.now() - options.retentionDays * DAY_MS).toISOString();
      const removed = await options.store.prune(before);
      if (removed > 0) logger.info('ScanScheduler', `Pruned ${removed} detections older than ${before}`);
    }
    return summary;
  } catch (e) {
    if (e instanceof ScanInProgress) {
      logger.warn('ScanScheduler', 'Scan already running, tick skipped');
    } else {
      logger.error('ScanScheduler', 'Scan failed', { error: errorMessage(e) });
    }
    return null;
  }
}

export function startScanScheduler(options: ScanSchedulerOptions): void {
  stopScanScheduler();
  const tick = () => {
    void runScheduledScan(options);
  };
  if (options.runOnStart) tick();
  intervalId = setInterval(tick, options.intervalMs);
  logger.info('ScanScheduler', `Started: every ${Math.round(options.intervalMs / 60_000)} min`);
}

export function stopScanScheduler(): void {
  if (intervalId != null) {
    clearInterval(intervalId);
    intervalId = null;
    logger.info('ScanScheduler', 'Stopped');
  }
}

export function getLastSummary(): BatchSummary | null {
  return lastSummary;
}

export function isScanRunning(): boolean {
  return running;
}
