/**
 * Trend Template — 8 критериев тренда второй стадии по скользящим 50/150/200
 * и диапазону за 52 недели
 */

import { SMA } from 'technicalindicators';
import type { CandleSeries } from '../types/candle';

const YEAR_BARS = 252;
const MONTH_BARS = 20;
const HALF_YEAR_BARS = 126;

export interface TrendTemplateResult {
  /** Criteria 1..8 in order */
  criteria: boolean[];
  passed: number;
}

/** Last SMA value and the one `lag` bars earlier; null without enough history */
function smaTail(closes: number[], period: number, lag = 0): { last: number | null; lagged: number | null } {
  if (closes.length < period) return { last: null, lagged: null };
  const values = SMA.calculate({ period, values: closes });
  const last = values[values.length - 1] ?? null;
  const lagged = lag > 0 && values.length > lag ? values[values.length - 1 - lag] : null;
  return { last, lagged };
}

function above(a: number | null, b: number | null): boolean {
  return a !== null && b !== null && a > b;
}

export function evaluateTrendTemplate(candles: CandleSeries): TrendTemplateResult {
  const n = candles.length;
  if (n === 0) return { criteria: new Array<boolean>(8).fill(false), passed: 0 };

  const closes = candles.map((c) => c.close);
  const price = closes[n - 1];
  const ma50 = smaTail(closes, 50).last;
  const ma150 = smaTail(closes, 150).last;
  const ma200Tail = smaTail(closes, 200, MONTH_BARS - 1);
  const ma200 = ma200Tail.last;

  const year = candles.slice(Math.max(0, n - YEAR_BARS));
  const high52 = Math.max(...year.map((c) => c.high));
  const low52 = Math.min(...year.map((c) => c.low));

  let momentum = true;
  if (n >= HALF_YEAR_BARS) {
    const before = closes[n - HALF_YEAR_BARS];
    momentum = before > 0 && (price - before) / before > 0.1;
  }

  const criteria = [
    above(price, ma150) && above(price, ma200),
    above(ma150, ma200),
    above(ma200, ma200Tail.lagged),
    above(ma50, ma150) && above(ma50, ma200),
    above(price, ma50),
    low52 > 0 && (price - low52) / low52 >= 0.3,
    high52 > 0 && (high52 - price) / high52 <= 0.25,
    momentum
  ];
  return { criteria, passed: criteria.filter(Boolean).length };
}
