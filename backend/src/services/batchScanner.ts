/**
 * Batch Scanner — скан вселенной тикеров пулом воркеров (bottleneck).
 *
 * Каждый воркер ведёт свой тикер от начала до конца: fetch → detect → upsert.
 * - FetchError: повтор с backoff, затем тикер пропускается (skipped)
 * - таймаут тикера: пропуск без повтора
 * - DataAnomaly: тикер failed, батч продолжается
 * - StoreError после всех повторов: батч прерывается с ошибкой
 */

import Bottleneck from 'bottleneck';
import type { DetectionStore } from '../db';
import type { Candle } from '../types/candle';
import type { ExternalSignals } from '../types/detection';
import type { CandleSeriesProvider, SignalsProvider } from './candleProvider';
import { VcpDetector } from './vcpDetector';
import type { VcpEvaluation } from './vcpClassifier';
import { DataAnomaly, FetchError, StoreError, TimeoutError, errorMessage } from '../lib/errors';
import { withRetry, withTimeout } from '../lib/retry';
import { logger } from '../lib/logger';
import { config } from '../config';

export interface BatchScanOptions {
  concurrency: number;
  tickerTimeoutMs: number;
  fetchRetries: number;
  storeRetries: number;
  retryBaseDelayMs: number;
  lookbackDays: number;
  sleep?: (ms: number) => Promise<void>;
}

export type TickerStatus = 'detected' | 'no_pattern' | 'failed' | 'skipped';

export interface TickerOutcome {
  ticker: string;
  status: TickerStatus;
  reason?: string;
}

export interface BatchSummary {
  startedAt: string;
  finishedAt: string;
  total: number;
  succeeded: number;
  detected: number;
  failed: number;
  skipped: number;
  failures: TickerOutcome[];
}

export interface BatchScannerDeps {
  provider: CandleSeriesProvider;
  store: DetectionStore;
  detector?: VcpDetector;
  signals?: SignalsProvider;
}

export const DEFAULT_BATCH_OPTIONS: BatchScanOptions = {
  concurrency: config.scan.concurrency,
  tickerTimeoutMs: config.scan.tickerTimeoutMs,
  fetchRetries: config.scan.fetchRetries,
  storeRetries: config.scan.storeRetries,
  retryBaseDelayMs: config.scan.retryBaseDelayMs,
  lookbackDays: config.scan.lookbackDays
};

export class BatchScanner {
  private readonly provider: CandleSeriesProvider;
  private readonly store: DetectionStore;
  private readonly detector: VcpDetector;
  private readonly signals?: SignalsProvider;
  readonly options: BatchScanOptions;

  constructor(deps: BatchScannerDeps, options: Partial<BatchScanOptions> = {}) {
    this.provider = deps.provider;
    this.store = deps.store;
    this.detector = deps.detector ?? new VcpDetector();
    this.signals = deps.signals;
    this.options = { ...DEFAULT_BATCH_OPTIONS, ...options };
  }

  /**
   * Run one batch. Resolves with the summary; rejects with StoreError when
   * persistence stays unavailable after retries.
   */
  async run(tickers: readonly string[]): Promise<BatchSummary> {
    const startedAt = new Date().toISOString();
    const unique = Array.from(new Set(tickers.map((t) => t.trim().toUpperCase()).filter(Boolean)));
    const limiter = new Bottleneck({ maxConcurrent: Math.max(1, this.options.concurrency) });
    const state: { fatal: StoreError | null } = { fatal: null };

    logger.info('BatchScanner', `Scanning ${unique.length} tickers`, {
      provider: this.provider.name,
      concurrency: this.options.concurrency
    });

    const jobs = unique.map((ticker) =>
      limiter.schedule(async (): Promise<TickerOutcome> => {
        if (state.fatal) return { ticker, status: 'skipped', reason: 'batch aborted' };
        try {
          return await this.scanOne(ticker);
        } catch (e) {
          if (e instanceof StoreError) {
            state.fatal = state.fatal ?? e;
            return { ticker, status: 'failed', reason: e.message };
          }
          logger.error('BatchScanner', `Unexpected error for ${ticker}`, { error: errorMessage(e) });
          return { ticker, status: 'failed', reason: errorMessage(e) };
        }
      })
    );
    const outcomes = await Promise.all(jobs);

    if (state.fatal) {
      logger.error('BatchScanner', 'Batch aborted: detection store unavailable', { error: state.fatal.message });
      throw state.fatal;
    }

    const summary = summarize(startedAt, outcomes);
    logger.info('BatchScanner', 'Scan complete', {
      total: summary.total,
      detected: summary.detected,
      failed: summary.failed,
      skipped: summary.skipped
    });
    return summary;
  }

  async scanOne(ticker: string): Promise<TickerOutcome> {
    let candles: Candle[];
    try {
      candles = await this.fetchCandles(ticker);
    } catch (e) {
      if (e instanceof TimeoutError || e instanceof FetchError) {
        logger.warn('BatchScanner', `Skip ${ticker}`, { error: e.message });
        return { ticker, status: 'skipped', reason: e.message };
      }
      if (e instanceof DataAnomaly) {
        logger.warn('BatchScanner', `Data anomaly for ${ticker}`, { error: e.message });
        return { ticker, status: 'failed', reason: e.message };
      }
      throw e;
    }

    const signals = await this.loadSignals(ticker);

    let result: VcpEvaluation;
    try {
      result = this.detector.evaluate(ticker, candles, signals);
    } catch (e) {
      if (e instanceof DataAnomaly) {
        logger.warn('BatchScanner', `Data anomaly for ${ticker}`, { error: e.message, index: e.index });
        return { ticker, status: 'failed', reason: e.message };
      }
      throw e;
    }
    if (!result.detected) {
      return { ticker, status: 'no_pattern', reason: result.reason };
    }

    const detection = result.detection;
    await withRetry(() => this.store.upsert(detection), {
      attempts: this.options.storeRetries,
      baseDelayMs: this.options.retryBaseDelayMs,
      retryIf: (e) => e instanceof StoreError && e.kind === 'unavailable',
      label: `upsert ${ticker}`,
      sleep: this.options.sleep
    });
    return { ticker, status: 'detected' };
  }

  private fetchCandles(ticker: string): Promise<Candle[]> {
    const attempt = withRetry(() => this.provider.fetch(ticker, this.options.lookbackDays), {
      attempts: this.options.fetchRetries,
      baseDelayMs: this.options.retryBaseDelayMs,
      retryIf: (e) => e instanceof FetchError,
      label: `fetch ${ticker}`,
      sleep: this.options.sleep
    });
    return withTimeout(attempt, this.options.tickerTimeoutMs, `fetch ${ticker}`);
  }

  private async loadSignals(ticker: string): Promise<ExternalSignals | undefined> {
    if (!this.signals) return undefined;
    try {
      return await this.signals.signals(ticker);
    } catch (e) {
      logger.warn('BatchScanner', `Signals unavailable for ${ticker}`, { error: errorMessage(e) });
      return undefined;
    }
  }
}

function summarize(startedAt: string, outcomes: TickerOutcome[]): BatchSummary {
  const count = (status: TickerStatus) => outcomes.filter((o) => o.status === status).length;
  const detected = count('detected');
  return {
    startedAt,
    finishedAt: new Date().toISOString(),
    total: outcomes.length,
    succeeded: detected + count('no_pattern'),
    detected,
    failed: count('failed'),
    skipped: count('skipped'),
    failures: outcomes.filter((o) => o.status === 'failed' || o.status === 'skipped')
  };
}
