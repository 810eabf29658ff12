/**
 * Contraction Scanner — поиск откатов (контракций) внутри базы
 *
 * 1. Swing High/Low по центрированному окну (radius баров слева и справа)
 * 2. Гэп-бары (ночной разрыв > gapThresholdPct) исключаются вместе со своим окном
 * 3. Сплит (close/prevClose вне [0.5, 2.0]): DataAnomaly, скан прерывается
 * 4. Каждый swing high связывается со следующим swing low
 */

import type { Candle, CandleSeries } from '../types/candle';
import type { Contraction } from '../types/detection';
import { DataAnomaly } from '../lib/errors';
import { config } from '../config';

export interface ContractionScannerOptions {
  minBars: number;
  swingRadius: number;
  minSpanBars: number;
  gapThresholdPct: number;
  thinVolume: number;
  splitRatioMin: number;
  splitRatioMax: number;
}

export interface SwingPoint {
  index: number;
  price: number;
  type: 'high' | 'low';
}

export const DEFAULT_SCANNER_OPTIONS: ContractionScannerOptions = {
  minBars: config.vcp.minBars,
  swingRadius: config.vcp.swingRadius,
  minSpanBars: config.vcp.minSpanBars,
  gapThresholdPct: config.vcp.gapThresholdPct,
  thinVolume: config.vcp.thinVolume,
  splitRatioMin: 0.5,
  splitRatioMax: 2.0
};

export class ContractionScanner {
  readonly options: ContractionScannerOptions;

  constructor(options: Partial<ContractionScannerOptions> = {}) {
    this.options = { ...DEFAULT_SCANNER_OPTIONS, ...options };
  }

  /**
   * Candidate contractions in chronological order.
   * Input is validated eagerly (DataAnomaly is thrown here); the returned
   * iterable is lazy and restarts from scratch on every iteration.
   */
  scan(candles: CandleSeries, ticker?: string): Iterable<Contraction> {
    this.validate(candles, ticker);
    if (candles.length < this.options.minBars) return [];
    return {
      [Symbol.iterator]: () => this.generate(candles)
    };
  }

  /**
   * Индексы гэп-баров: ночной разрыв больше порога или флаг провайдера
   */
  findGapBars(candles: CandleSeries): Set<number> {
    const gaps = new Set<number>();
    for (let i = 0; i < candles.length; i++) {
      const c = candles[i];
      if (c.gapFlag) {
        gaps.add(i);
        continue;
      }
      if (i === 0) continue;
      const prevClose = candles[i - 1].close;
      const gapPct = (Math.abs(c.open - prevClose) / prevClose) * 100;
      if (gapPct > this.options.gapThresholdPct) gaps.add(i);
    }
    return gaps;
  }

  /**
   * Swing-точки в хронологическом порядке, без гэп-окон
   */
  findSwings(candles: CandleSeries): SwingPoint[] {
    const r = this.options.swingRadius;
    const gaps = this.findGapBars(candles);
    const swings: SwingPoint[] = [];

    for (let i = r; i < candles.length - r; i++) {
      if (this.touchesGap(i, gaps)) continue;
      if (this.isSwingHigh(candles, i, r)) {
        swings.push({ index: i, price: candles[i].high, type: 'high' });
      }
      if (this.isSwingLow(candles, i, r)) {
        swings.push({ index: i, price: candles[i].low, type: 'low' });
      }
    }

    return swings;
  }

  private *generate(candles: CandleSeries): Generator<Contraction> {
    const pivots = this.alternate(this.findSwings(candles));

    for (let k = 0; k < pivots.length - 1; k++) {
      const high = pivots[k];
      const low = pivots[k + 1];
      if (high.type !== 'high' || low.type !== 'low') continue;

      const barSpan = low.index - high.index + 1;
      if (barSpan < this.options.minSpanBars) continue;

      yield {
        startIndex: high.index,
        endIndex: low.index,
        startDate: candles[high.index].date,
        endDate: candles[low.index].date,
        highPrice: high.price,
        lowPrice: low.price,
        depthPct: ((high.price - low.price) / high.price) * 100,
        avgVolume: this.averageVolume(candles, high.index, low.index),
        barSpan
      };
    }
  }

  /**
   * Сжать подряд идущие однотипные swing-точки: из highs остаётся максимальный,
   * из lows минимальный (при равенстве более ранний)
   */
  private alternate(swings: SwingPoint[]): SwingPoint[] {
    const out: SwingPoint[] = [];
    for (const s of swings) {
      const last = out[out.length - 1];
      if (!last || last.type !== s.type) {
        out.push(s);
        continue;
      }
      const better = s.type === 'high' ? s.price > last.price : s.price < last.price;
      if (better) out[out.length - 1] = s;
    }
    return out;
  }

  private isSwingHigh(candles: CandleSeries, index: number, radius: number): boolean {
    const curr = candles[index].high;
    for (let i = index - radius; i < index; i++) {
      if (candles[i].high >= curr) return false;
    }
    for (let i = index + 1; i <= index + radius; i++) {
      if (candles[i].high > curr) return false;
    }
    return true;
  }

  private isSwingLow(candles: CandleSeries, index: number, radius: number): boolean {
    const curr = candles[index].low;
    for (let i = index - radius; i < index; i++) {
      if (candles[i].low <= curr) return false;
    }
    for (let i = index + 1; i <= index + radius; i++) {
      if (candles[i].low < curr) return false;
    }
    return true;
  }

  private touchesGap(index: number, gaps: Set<number>): boolean {
    if (gaps.size === 0) return false;
    const r = this.options.swingRadius;
    for (let i = index - r; i <= index + r; i++) {
      if (gaps.has(i)) return true;
    }
    return false;
  }

  private averageVolume(candles: CandleSeries, start: number, end: number): number {
    let sum = 0;
    let count = 0;
    for (let i = start; i <= end; i++) {
      const v = candles[i].volume;
      if (v <= this.options.thinVolume) continue;
      sum += v;
      count++;
    }
    return count > 0 ? sum / count : 0;
  }

  private validate(candles: CandleSeries, ticker?: string): void {
    if (candles.length === 0) {
      throw new DataAnomaly('Empty candle series', { ticker });
    }
    for (let i = 0; i < candles.length; i++) {
      const c = candles[i];
      if (!isValidCandle(c)) {
        throw new DataAnomaly(`Malformed candle at ${c.date}`, { ticker, index: i });
      }
      if (i === 0) continue;
      const prev = candles[i - 1];
      if (c.date <= prev.date) {
        throw new DataAnomaly(`Non-monotonic dates: ${prev.date} -> ${c.date}`, { ticker, index: i });
      }
      if (c.gapFlag) continue;
      const ratio = c.close / prev.close;
      if (ratio < this.options.splitRatioMin || ratio > this.options.splitRatioMax) {
        throw new DataAnomaly(
          `Split-like move at ${c.date}: close ratio ${ratio.toFixed(3)}`,
          { ticker, index: i }
        );
      }
    }
  }
}

function isValidCandle(c: Candle): boolean {
  const prices = [c.open, c.high, c.low, c.close];
  if (!prices.every((p) => Number.isFinite(p) && p > 0)) return false;
  if (!Number.isFinite(c.volume) || c.volume < 0) return false;
  if (!/^\d{4}-\d{2}-\d{2}$/.test(c.date)) return false;
  // 2024-13-45 проходит regex, но не календарь
  const ts = Date.parse(`${c.date}T00:00:00.000Z`);
  return !Number.isNaN(ts) && new Date(ts).toISOString().slice(0, 10) === c.date;
}
