import axios, { type AxiosInstance } from 'axios';
import type { Candle } from '../types/candle';
import type { ExternalSignals } from '../types/detection';
import { DataAnomaly, FetchError, errorMessage } from '../lib/errors';
import { config } from '../config';
import { logger } from '../lib/logger';

/**
 * Источник дневных свечей. Ядро использует только этот контракт.
 */
export interface CandleSeriesProvider {
  readonly name: string;
  /** Ordered daily candles; throws FetchError or DataAnomaly */
  fetch(ticker: string, lookbackDays: number): Promise<Candle[]>;
}

/** Externally computed RS / liquidity per ticker */
export interface SignalsProvider {
  signals(ticker: string): Promise<ExternalSignals>;
}

interface FinnhubCandleResponse {
  s: string;
  t?: number[];
  o?: number[];
  h?: number[];
  l?: number[];
  c?: number[];
  v?: number[];
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Finnhub REST: GET /stock/candle?resolution=D
 */
export class FinnhubCandleProvider implements CandleSeriesProvider {
  readonly name = 'finnhub';
  private readonly http: AxiosInstance;
  private readonly apiKey: string;

  constructor(options: { apiKey?: string; baseUrl?: string; timeoutMs?: number; http?: AxiosInstance } = {}) {
    this.apiKey = options.apiKey ?? config.finnhub.apiKey;
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl ?? config.finnhub.baseUrl,
        timeout: options.timeoutMs ?? config.finnhub.timeoutMs
      });
  }

  async fetch(ticker: string, lookbackDays: number): Promise<Candle[]> {
    if (!this.apiKey) {
      throw new FetchError(ticker, 'FINNHUB_API_KEY is not configured');
    }
    const to = Math.floor(Date.now() / 1000);
    const from = to - Math.ceil((lookbackDays * DAY_MS) / 1000);

    let data: FinnhubCandleResponse;
    try {
      const res = await this.http.get<FinnhubCandleResponse>('/stock/candle', {
        params: { symbol: ticker, resolution: 'D', from, to, token: this.apiKey }
      });
      data = res.data;
    } catch (e) {
      const status = axios.isAxiosError(e) ? e.response?.status : undefined;
      logger.warn('Finnhub', 'Candle fetch failed', { ticker, status, error: errorMessage(e) });
      throw new FetchError(ticker, `Finnhub request failed: ${errorMessage(e)}`, { cause: e, status });
    }

    const candles = parseFinnhubCandles(ticker, data);
    logger.debug('Finnhub', `Fetched ${candles.length} bars`, { ticker });
    return candles;
  }
}

export function parseFinnhubCandles(ticker: string, data: FinnhubCandleResponse): Candle[] {
  if (data.s === 'no_data') {
    throw new DataAnomaly('Provider returned no data', { ticker });
  }
  if (data.s !== 'ok') {
    throw new FetchError(ticker, `Unexpected Finnhub status "${data.s}"`);
  }
  const { t = [], o = [], h = [], l = [], c = [], v = [] } = data;
  const n = t.length;
  if (n === 0) throw new DataAnomaly('Provider returned an empty series', { ticker });
  if ([o, h, l, c, v].some((arr) => arr.length !== n)) {
    throw new DataAnomaly('Ragged OHLCV arrays', { ticker });
  }

  const candles: Candle[] = [];
  for (let i = 0; i < n; i++) {
    candles.push({
      date: new Date(t[i] * 1000).toISOString().slice(0, 10),
      open: Number(o[i]),
      high: Number(h[i]),
      low: Number(l[i]),
      close: Number(c[i]),
      volume: Math.max(0, Math.round(Number(v[i] ?? 0)))
    });
  }
  return candles;
}
