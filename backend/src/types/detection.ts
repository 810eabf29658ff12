/**
 * Контракция: откат от swing high к следующему swing low.
 */
export interface Contraction {
  startIndex: number;
  endIndex: number;
  startDate: string;
  endDate: string;
  highPrice: number;
  lowPrice: number;
  depthPct: number;     // (high - low) / high × 100
  avgVolume: number;    // без thin/zero баров
  barSpan: number;      // endIndex - startIndex + 1
}

export const VCP_PATTERN = 'VCP';

export type PatternName = typeof VCP_PATTERN;

export interface ConfidenceBreakdown {
  symmetry: number;
  baseLength: number;
  relativeStrength: number;
  liquidity: number;
}

export interface VcpMeta {
  triggered: boolean;
  stopLoss: number;
  daysInPattern: number;
  baseLengthBars: number;
  finalContractionPct: number;
  dryUpAvgVolume: number;
  dryUpThreshold: number;
  breakoutVolumeRatio: number | null;
  avgDollarVolume: number;
  /** Trend template criteria met, out of 8; null when the filter is off */
  trendCriteriaPassed: number | null;
  scores: ConfidenceBreakdown;
  contractions: Contraction[];
}

export interface VcpDetection {
  ticker: string;
  pattern: PatternName;
  /** ISO timestamp of the evaluated bar */
  asOf: string;
  contractions: Contraction[];
  pivotPrice: number;
  confidence: number;
  baseDepthPct: number;
  rs: number | null;
  price: number;
  meta: VcpMeta;
}

/** Externally computed per-ticker inputs to the confidence model */
export interface ExternalSignals {
  /** Relative strength rating 0–100 */
  rsRating?: number;
  /** Average daily dollar volume; computed from candles when absent */
  avgDollarVolume?: number;
}
