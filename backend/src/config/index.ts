/**
 * Centralized configuration for the VCP scanner backend.
 * All env vars and constants in one place.
 */

function envStr(key: string, fallback = ''): string {
  return (process.env[key] ?? fallback).trim();
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  if (v === undefined || v === '') return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

function envBool(key: string, fallback = false): boolean {
  const v = process.env[key]?.toLowerCase();
  if (v === undefined || v === '') return fallback;
  return v === '1' || v === 'true' || v === 'yes';
}

function envList(key: string): string[] {
  const raw = envStr(key);
  if (!raw) return [];
  return raw.split(',').map((s) => s.trim()).filter(Boolean);
}

export const config = {
  version: '0.1.0',
  port: envNum('PORT', 3000),
  nodeEnv: envStr('NODE_ENV', 'development'),
  isProd: process.env.NODE_ENV === 'production',

  /** CORS allowlist; пусто = любой origin */
  allowedOrigins: envList('ALLOWED_ORIGINS'),

  database: {
    /** Путь к SQLite файлу; ':memory:' для тестов */
    path: envStr('DATABASE_PATH'),
    retentionDays: envNum('RETENTION_DAYS', 730)
  },

  finnhub: {
    apiKey: envStr('FINNHUB_API_KEY'),
    baseUrl: envStr('FINNHUB_BASE_URL', 'https://finnhub.io/api/v1'),
    timeoutMs: envNum('FINNHUB_TIMEOUT_MS', 10_000),
    get hasCredentials(): boolean {
      return Boolean(this.apiKey);
    }
  },

  pagination: {
    /** HMAC key for cursor tokens */
    cursorSecret: envStr('CURSOR_SECRET', 'dev-cursor-secret'),
    defaultLimit: envNum('PAGE_DEFAULT_LIMIT', 50),
    maxLimit: envNum('PAGE_MAX_LIMIT', 200)
  },

  scan: {
    concurrency: envNum('SCAN_CONCURRENCY', 4),
    tickerTimeoutMs: envNum('SCAN_TICKER_TIMEOUT_MS', 20_000),
    fetchRetries: envNum('SCAN_FETCH_RETRIES', 3),
    storeRetries: envNum('SCAN_STORE_RETRIES', 3),
    retryBaseDelayMs: envNum('SCAN_RETRY_BASE_MS', 500),
    lookbackDays: envNum('SCAN_LOOKBACK_DAYS', 365),
    intervalMs: envNum('SCAN_INTERVAL_MS', 24 * 60 * 60 * 1000),
    get onStart(): boolean {
      return envBool('SCAN_ON_START', false);
    },
    universePath: envStr('UNIVERSE_PATH', 'data/universe.csv')
  },

  /** Пороги детектора VCP */
  vcp: {
    minBars: envNum('VCP_MIN_BARS', 60),
    swingRadius: envNum('VCP_SWING_RADIUS', 5),
    minSpanBars: envNum('VCP_MIN_SPAN_BARS', 5),
    gapThresholdPct: envNum('VCP_GAP_THRESHOLD_PCT', 8),
    thinVolume: envNum('VCP_THIN_VOLUME', 0),
    dryUpBars: envNum('VCP_DRY_UP_BARS', 10),
    baseLookback: envNum('VCP_BASE_LOOKBACK', 50),
    dryUpPercentile: envNum('VCP_DRY_UP_PERCENTILE', 10),
    breakoutMultiplier: envNum('VCP_BREAKOUT_MULTIPLIER', 1.4),
    breakoutSmaPeriod: envNum('VCP_BREAKOUT_SMA_PERIOD', 50),
    minDecayRatio: envNum('VCP_MIN_DECAY_RATIO', 0.1),
    maxContractions: envNum('VCP_MAX_CONTRACTIONS', 6),
    pivotBufferPct: envNum('VCP_PIVOT_BUFFER_PCT', 0),
    liquidityFloor: envNum('VCP_LIQUIDITY_FLOOR', 20_000_000),
    /** Дополнительные фильтры; 0 / false = выключено */
    minPrice: envNum('VCP_MIN_PRICE', 0),
    minAvgVolume: envNum('VCP_MIN_AVG_VOLUME', 0),
    trendTemplate: envBool('VCP_TREND_TEMPLATE', false),
    trendMinCriteria: envNum('VCP_TREND_MIN_CRITERIA', 6),
    maxBaseDepthPct: envNum('VCP_MAX_BASE_DEPTH_PCT', 0),
    finalContractionMaxPct: envNum('VCP_FINAL_CONTRACTION_MAX_PCT', 0)
  }
};

export default config;
