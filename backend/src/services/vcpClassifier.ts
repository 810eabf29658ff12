/**
 * VCP Classifier — решение pass/fail по контракциям и объёму
 *
 * Порядок проверок (первая неудача прерывает):
 * 0. Опциональные фильтры: мин. цена, мин. средний объём, trend template
 * 1. ≥3 контракций в хронологическом порядке
 * 2. Закон сжатия: каждая глубина меньше предыдущей минимум на minDecayRatio,
 *    абсолютные полосы для #1..#3, опциональные пределы глубины базы и
 *    последней контракции
 * 3. Высыхание объёма в хвосте последней контракции
 * 4. Цена под пивотом (forming) или только что пробила его с объёмом (triggered)
 */

import type { CandleSeries } from '../types/candle';
import {
  VCP_PATTERN,
  type Contraction,
  type ConfidenceBreakdown,
  type ExternalSignals,
  type VcpDetection
} from '../types/detection';
import { VolumeProfileAnalyzer, type BreakoutVolumeResult } from './volumeProfile';
import {
  baseLengthScore,
  combineConfidence,
  liquidityScore,
  relativeStrengthScore,
  symmetryScore
} from './confidence';
import { evaluateTrendTemplate } from './trendTemplate';
import { config } from '../config';

/** Inclusive depth band, percent */
export type DepthBand = readonly [number, number];

export interface VcpClassifierOptions {
  minContractions: number;
  maxContractions: number;
  /** Minimum relative shrink between consecutive contractions, 0.1 = 10% */
  minDecayRatio: number;
  /** Absolute bands for contraction #1, #2, #3 */
  depthBands: readonly DepthBand[];
  pivotBufferPct: number;
  liquidityFloor: number;
  liquidityBars: number;
  /** 0 disables the filter */
  minPrice: number;
  /** Mean volume over liquidityBars; 0 disables the filter */
  minAvgVolume: number;
  trendTemplate: boolean;
  trendMinCriteria: number;
  /** (max high - min low) / max high of the base, percent; 0 disables */
  maxBaseDepthPct: number;
  /** 0 disables */
  finalContractionMaxPct: number;
}

export const DEFAULT_DEPTH_BANDS: readonly DepthBand[] = [
  [25, 35],
  [15, 20],
  [8, 12]
];

export const DEFAULT_CLASSIFIER_OPTIONS: VcpClassifierOptions = {
  minContractions: 3,
  maxContractions: config.vcp.maxContractions,
  minDecayRatio: config.vcp.minDecayRatio,
  depthBands: DEFAULT_DEPTH_BANDS,
  pivotBufferPct: config.vcp.pivotBufferPct,
  liquidityFloor: config.vcp.liquidityFloor,
  liquidityBars: 50,
  minPrice: config.vcp.minPrice,
  minAvgVolume: config.vcp.minAvgVolume,
  trendTemplate: config.vcp.trendTemplate,
  trendMinCriteria: config.vcp.trendMinCriteria,
  maxBaseDepthPct: config.vcp.maxBaseDepthPct,
  finalContractionMaxPct: config.vcp.finalContractionMaxPct
};

export type VcpRejectReason =
  | 'insufficient_data'
  | 'below_min_price'
  | 'below_min_volume'
  | 'trend_template'
  | 'insufficient_contractions'
  | 'not_contracting'
  | 'depth_bands'
  | 'base_too_deep'
  | 'final_contraction_wide'
  | 'no_dry_up'
  | 'extended'
  | 'breakout_unconfirmed';

export type VcpEvaluation =
  | { detected: true; detection: VcpDetection }
  | { detected: false; reason: VcpRejectReason; detail?: string };

export interface ClassifierInput {
  ticker: string;
  candles: CandleSeries;
  contractions: Iterable<Contraction>;
  signals?: ExternalSignals;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export class VcpClassifier {
  readonly options: VcpClassifierOptions;
  private readonly volume: VolumeProfileAnalyzer;

  constructor(options: Partial<VcpClassifierOptions> = {}, volume: VolumeProfileAnalyzer = new VolumeProfileAnalyzer()) {
    this.options = { ...DEFAULT_CLASSIFIER_OPTIONS, ...options };
    this.volume = volume;
  }

  classify(input: ClassifierInput): VcpDetection | null {
    const result = this.evaluate(input);
    return result.detected ? result.detection : null;
  }

  evaluate(input: ClassifierInput): VcpEvaluation {
    const { ticker, candles, signals } = input;
    const n = candles.length;
    if (n < 2) return { detected: false, reason: 'insufficient_data' };

    // === 0. Фильтры ликвидности и тренда ===
    const { minPrice, minAvgVolume } = this.options;
    const lastClose = candles[n - 1].close;
    if (minPrice > 0 && lastClose < minPrice) {
      return { detected: false, reason: 'below_min_price', detail: `close ${lastClose} < ${minPrice}` };
    }
    if (minAvgVolume > 0) {
      const avgVolume = this.volume.averageVolume(candles, n - this.options.liquidityBars, n - 1);
      if (avgVolume < minAvgVolume) {
        return {
          detected: false,
          reason: 'below_min_volume',
          detail: `avg volume ${Math.round(avgVolume)} < ${minAvgVolume}`
        };
      }
    }
    let trendCriteriaPassed: number | null = null;
    if (this.options.trendTemplate) {
      const trend = evaluateTrendTemplate(candles);
      trendCriteriaPassed = trend.passed;
      if (trend.passed < this.options.trendMinCriteria) {
        return { detected: false, reason: 'trend_template', detail: `${trend.passed}/8 criteria` };
      }
    }

    // === 1. Количество контракций ===
    const all = Array.from(input.contractions).sort((a, b) => a.startIndex - b.startIndex);
    if (all.length < this.options.minContractions) {
      return {
        detected: false,
        reason: 'insufficient_contractions',
        detail: `${all.length} contractions, need ${this.options.minContractions}`
      };
    }

    // === 2. Закон сжатия + полосы глубины ===
    const run = this.trailingContractingRun(all);
    if (run.length < this.options.minContractions) {
      return { detected: false, reason: 'not_contracting', detail: `trailing run of ${run.length}` };
    }
    const base = this.selectBase(run);
    if (!base) {
      return {
        detected: false,
        reason: 'depth_bands',
        detail: run.map((c) => c.depthPct.toFixed(1)).join(' > ')
      };
    }

    const last = base[base.length - 1];
    const maxHigh = Math.max(...base.map((c) => c.highPrice));
    const minLow = Math.min(...base.map((c) => c.lowPrice));
    const baseDepthPct = ((maxHigh - minLow) / maxHigh) * 100;
    if (this.options.maxBaseDepthPct > 0 && baseDepthPct > this.options.maxBaseDepthPct) {
      return { detected: false, reason: 'base_too_deep', detail: `base depth ${baseDepthPct.toFixed(1)}%` };
    }
    if (this.options.finalContractionMaxPct > 0 && last.depthPct > this.options.finalContractionMaxPct) {
      return {
        detected: false,
        reason: 'final_contraction_wide',
        detail: `final contraction ${last.depthPct.toFixed(1)}%`
      };
    }

    const pivotPrice = last.highPrice * (1 + this.options.pivotBufferPct / 100);
    const lastBar = candles[n - 1];
    const prevBar = candles[n - 2];
    const aboveNow = lastBar.close > pivotPrice;

    // Цена уже закрывалась выше пивота до последнего бара: пробой несвежий
    for (let i = last.endIndex + 1; i < n - 1; i++) {
      if (candles[i].close > pivotPrice) {
        return { detected: false, reason: 'extended', detail: `closed above pivot on ${candles[i].date}` };
      }
    }

    // === 3. Высыхание объёма (хвост базы до бара пробоя) ===
    const tailEnd = aboveNow ? n - 2 : n - 1;
    const dryUp = this.volume.checkDryUp(candles, tailEnd);
    if (!dryUp.dryUp) {
      return {
        detected: false,
        reason: 'no_dry_up',
        detail: `avg ${Math.round(dryUp.avgVolume)} > decile ${Math.round(dryUp.threshold)}`
      };
    }

    // === 4. Терминальное состояние: forming / triggered ===
    let breakout: BreakoutVolumeResult | null = null;
    if (aboveNow) {
      if (prevBar.close > pivotPrice) {
        return { detected: false, reason: 'extended' };
      }
      breakout = this.volume.checkBreakout(candles, n - 1);
      if (!breakout.confirmed) {
        return {
          detected: false,
          reason: 'breakout_unconfirmed',
          detail: `volume ratio ${breakout.ratio?.toFixed(2) ?? 'n/a'}`
        };
      }
    }

    // === Confidence ===
    const baseLengthBars = n - base[0].startIndex;
    const avgDollarVolume =
      signals?.avgDollarVolume ?? this.volume.averageDollarVolume(candles, this.options.liquidityBars);
    const scores: ConfidenceBreakdown = {
      symmetry: symmetryScore(base.map((c) => c.depthPct)),
      baseLength: baseLengthScore(baseLengthBars),
      relativeStrength: relativeStrengthScore(signals?.rsRating),
      liquidity: liquidityScore(avgDollarVolume, this.options.liquidityFloor)
    };

    const asOf = toAsOf(lastBar.date);

    const detection: VcpDetection = {
      ticker,
      pattern: VCP_PATTERN,
      asOf,
      contractions: base,
      pivotPrice,
      confidence: combineConfidence(scores),
      baseDepthPct,
      rs: signals?.rsRating ?? null,
      price: lastBar.close,
      meta: {
        triggered: breakout !== null,
        stopLoss: last.lowPrice,
        daysInPattern: Math.max(0, Math.round((Date.parse(asOf) - Date.parse(toAsOf(base[0].startDate))) / DAY_MS)),
        baseLengthBars,
        finalContractionPct: last.depthPct,
        dryUpAvgVolume: dryUp.avgVolume,
        dryUpThreshold: dryUp.threshold,
        breakoutVolumeRatio: breakout?.ratio ?? null,
        avgDollarVolume,
        trendCriteriaPassed,
        scores,
        contractions: base
      }
    };

    return { detected: true, detection };
  }

  /**
   * Хвостовая серия контракций, где каждая глубина меньше предыдущей
   * минимум на minDecayRatio; не длиннее maxContractions
   */
  private trailingContractingRun(all: Contraction[]): Contraction[] {
    const shrink = 1 - this.options.minDecayRatio;
    const run: Contraction[] = [all[all.length - 1]];
    for (let i = all.length - 2; i >= 0 && run.length < this.options.maxContractions; i--) {
      const prev = all[i];
      const next = run[0];
      if (next.depthPct < prev.depthPct && next.depthPct <= prev.depthPct * shrink) {
        run.unshift(prev);
      } else {
        break;
      }
    }
    return run;
  }

  /**
   * Самый ранний старт внутри серии, при котором #1..#3 попадают в полосы
   * и остаётся не меньше minContractions контракций
   */
  private selectBase(run: Contraction[]): Contraction[] | null {
    const bands = this.options.depthBands;
    for (let start = 0; start + this.options.minContractions <= run.length; start++) {
      const candidate = run.slice(start);
      const inBands = bands.every((band, k) => {
        const c = candidate[k];
        return c === undefined || (c.depthPct >= band[0] && c.depthPct <= band[1]);
      });
      if (inBands) return candidate;
    }
    return null;
  }
}

/** YYYY-MM-DD → ISO timestamp at UTC midnight */
export function toAsOf(date: string): string {
  return new Date(`${date}T00:00:00.000Z`).toISOString();
}
