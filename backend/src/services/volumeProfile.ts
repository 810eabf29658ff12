/**
 * Volume Profile Analyzer — высыхание объёма в хвосте базы и подтверждение пробоя
 */

import { SMA } from 'technicalindicators';
import type { CandleSeries } from '../types/candle';
import { config } from '../config';

export interface VolumeProfileOptions {
  dryUpBars: number;
  baseLookback: number;
  /** Percentile of the base volume distribution, 10 = bottom decile */
  dryUpPercentile: number;
  breakoutMultiplier: number;
  breakoutSmaPeriod: number;
  thinVolume: number;
}

export interface DryUpResult {
  dryUp: boolean;
  avgVolume: number;
  threshold: number;
  windowStart: number;
  windowEnd: number;
  baseStart: number;
}

export interface BreakoutVolumeResult {
  confirmed: boolean;
  volume: number;
  /** SMA of the bars before the breakout bar; null when history is too short */
  averageVolume: number | null;
  ratio: number | null;
}

export const DEFAULT_VOLUME_OPTIONS: VolumeProfileOptions = {
  dryUpBars: config.vcp.dryUpBars,
  baseLookback: config.vcp.baseLookback,
  dryUpPercentile: config.vcp.dryUpPercentile,
  breakoutMultiplier: config.vcp.breakoutMultiplier,
  breakoutSmaPeriod: config.vcp.breakoutSmaPeriod,
  thinVolume: config.vcp.thinVolume
};

export class VolumeProfileAnalyzer {
  readonly options: VolumeProfileOptions;

  constructor(options: Partial<VolumeProfileOptions> = {}) {
    this.options = { ...DEFAULT_VOLUME_OPTIONS, ...options };
  }

  /**
   * Nearest-rank percentile: sorted[ceil(p/100 × n) - 1].
   * Thin bars are left out of the distribution.
   */
  percentileThreshold(volumes: readonly number[], percentile = this.options.dryUpPercentile): number | null {
    const usable = volumes.filter((v) => v > this.options.thinVolume).sort((a, b) => a - b);
    if (!usable.length) return null;
    const rank = Math.max(1, Math.ceil((percentile / 100) * usable.length));
    return usable[Math.min(rank, usable.length) - 1];
  }

  /**
   * Dry-up: средний объём последних dryUpBars баров (до endIndex включительно)
   * не выше нижнего дециля объёма базы (baseLookback баров до endIndex)
   */
  checkDryUp(candles: CandleSeries, endIndex: number = candles.length - 1): DryUpResult {
    const windowEnd = Math.min(endIndex, candles.length - 1);
    const windowStart = Math.max(0, windowEnd - this.options.dryUpBars + 1);
    const baseStart = Math.max(0, windowEnd - this.options.baseLookback + 1);

    const baseVolumes: number[] = [];
    for (let i = baseStart; i <= windowEnd; i++) baseVolumes.push(candles[i].volume);

    const avgVolume = this.averageVolume(candles, windowStart, windowEnd);
    const threshold = this.percentileThreshold(baseVolumes);
    const enoughHistory = windowEnd - windowStart + 1 >= this.options.dryUpBars;
    const dryUp = enoughHistory && threshold !== null && avgVolume > 0 && avgVolume <= threshold;

    return {
      dryUp,
      avgVolume,
      threshold: threshold ?? 0,
      windowStart,
      windowEnd,
      baseStart
    };
  }

  /**
   * Пробой подтверждён, если объём бара ≥ multiplier × SMA(period) объёма
   * на предыдущем баре (сам бар пробоя в среднее не входит)
   */
  checkBreakout(candles: CandleSeries, index: number = candles.length - 1): BreakoutVolumeResult {
    const period = this.options.breakoutSmaPeriod;
    const volume = candles[index]?.volume ?? 0;
    if (index < period) {
      return { confirmed: false, volume, averageVolume: null, ratio: null };
    }

    const prior = candles.slice(index - period, index).map((c) => c.volume);
    const sma = SMA.calculate({ period, values: prior });
    const averageVolume = sma.length ? sma[sma.length - 1] : 0;
    if (averageVolume <= 0) {
      return { confirmed: false, volume, averageVolume, ratio: null };
    }

    const ratio = volume / averageVolume;
    return {
      confirmed: ratio >= this.options.breakoutMultiplier,
      volume,
      averageVolume,
      ratio
    };
  }

  /** Средний объём без thin/zero баров */
  averageVolume(candles: CandleSeries, start: number, end: number): number {
    let sum = 0;
    let count = 0;
    for (let i = Math.max(0, start); i <= Math.min(end, candles.length - 1); i++) {
      const v = candles[i].volume;
      if (v <= this.options.thinVolume) continue;
      sum += v;
      count++;
    }
    return count > 0 ? sum / count : 0;
  }

  /** Average close × volume over the last `bars` bars up to endIndex */
  averageDollarVolume(candles: CandleSeries, bars: number, endIndex: number = candles.length - 1): number {
    const start = Math.max(0, endIndex - bars + 1);
    let sum = 0;
    let count = 0;
    for (let i = start; i <= endIndex; i++) {
      const c = candles[i];
      if (c.volume <= this.options.thinVolume) continue;
      sum += c.close * c.volume;
      count++;
    }
    return count > 0 ? sum / count : 0;
  }
}
