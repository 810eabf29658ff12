import { describe, it, expect } from 'vitest';
import { ContractionScanner } from './contractionScanner';
import { DataAnomaly } from '../lib/errors';
import { dateAt, randomWalkSeries, twoContractionSeries, vcpSeries } from '../test/series';

describe('ContractionScanner', () => {
  const scanner = new ContractionScanner({ minBars: 60, swingRadius: 5, minSpanBars: 5, gapThresholdPct: 8 });

  it('finds alternating swing points', () => {
    const swings = scanner.findSwings(vcpSeries());
    expect(swings.filter((s) => s.type === 'high').map((s) => s.index)).toEqual([20, 40, 60, 78]);
    expect(swings.filter((s) => s.type === 'low').map((s) => s.index)).toEqual([30, 50, 68]);
  });

  it('pairs each swing high with the next swing low', () => {
    const contractions = Array.from(scanner.scan(vcpSeries(), 'TEST'));
    expect(contractions.map((c) => [c.startIndex, c.endIndex])).toEqual([
      [20, 30],
      [40, 50],
      [60, 68]
    ]);
    expect(contractions[0].depthPct).toBeCloseTo(30, 6);
    expect(contractions[1].depthPct).toBeCloseTo(17, 6);
    expect(contractions[2].depthPct).toBeCloseTo(10, 6);
    expect(contractions[0].barSpan).toBe(11);
    expect(contractions[0].startDate).toBe(dateAt(20));
    expect(contractions[2].avgVolume).toBe(1_000_000);
  });

  it('returns a restartable iterable', () => {
    const result = scanner.scan(vcpSeries());
    expect(Array.from(result)).toHaveLength(3);
    expect(Array.from(result)).toHaveLength(3);
  });

  it('returns nothing for a series shorter than minBars', () => {
    expect(Array.from(scanner.scan(vcpSeries().slice(0, 59)))).toEqual([]);
  });

  it('yields only two contractions when the base has two', () => {
    expect(Array.from(scanner.scan(twoContractionSeries()))).toHaveLength(2);
  });

  it('drops swings inside the window of an overnight gap', () => {
    const candles = vcpSeries();
    candles[10] = { ...candles[10], open: 102.35, high: 102.35 };
    expect(scanner.findGapBars(candles)).toEqual(new Set([10]));
    expect(scanner.findSwings(candles).map((s) => s.index)).toEqual([20, 30, 40, 50, 60, 68, 78]);
  });

  it('treats provider-flagged bars as gaps', () => {
    const candles = vcpSeries();
    candles[30] = { ...candles[30], gapFlag: true };
    const swings = scanner.findSwings(candles);
    expect(swings.some((s) => s.index === 30)).toBe(false);
    const contractions = Array.from(scanner.scan(candles));
    expect(contractions.map((c) => [c.startIndex, c.endIndex])).toEqual([
      [20, 50],
      [60, 68]
    ]);
  });

  it('throws DataAnomaly on a split-like move', () => {
    const candles = vcpSeries();
    candles[45] = { ...candles[45], close: candles[44].close * 0.45 };
    expect(() => scanner.scan(candles, 'SPLT')).toThrow(DataAnomaly);
    try {
      scanner.scan(candles, 'SPLT');
    } catch (e) {
      expect(e).toBeInstanceOf(DataAnomaly);
      if (e instanceof DataAnomaly) {
        expect(e.index).toBe(45);
        expect(e.ticker).toBe('SPLT');
      }
    }
  });

  it('skips the split check on flagged bars', () => {
    const candles = [
      { date: '2024-01-01', open: 100, high: 100, low: 100, close: 100, volume: 1000 },
      { date: '2024-01-02', open: 45, high: 46, low: 44, close: 45, volume: 1000, gapFlag: true },
      { date: '2024-01-03', open: 45, high: 47, low: 45, close: 46, volume: 1000 }
    ];
    expect(Array.from(scanner.scan(candles))).toEqual([]);
  });

  it('rejects empty, malformed and unordered input', () => {
    expect(() => scanner.scan([])).toThrow(DataAnomaly);

    const nan = vcpSeries();
    nan[5] = { ...nan[5], close: Number.NaN };
    expect(() => scanner.scan(nan)).toThrow(/Malformed candle/);

    const impossible = vcpSeries();
    impossible[89] = { ...impossible[89], date: '2024-13-45' };
    expect(() => scanner.scan(impossible)).toThrow(DataAnomaly);

    const feb30 = vcpSeries();
    feb30[89] = { ...feb30[89], date: '2024-02-30' };
    expect(() => scanner.scan(feb30)).toThrow(/Malformed candle/);

    const unordered = vcpSeries();
    unordered[7] = { ...unordered[7], date: unordered[6].date };
    expect(() => scanner.scan(unordered)).toThrow(/Non-monotonic dates/);
  });

  it('produces chronological, non-overlapping contractions on random walks', () => {
    for (let seed = 1; seed <= 40; seed++) {
      const contractions = Array.from(scanner.scan(randomWalkSeries(seed)));
      for (let k = 0; k < contractions.length; k++) {
        const c = contractions[k];
        expect(c.endIndex).toBeGreaterThan(c.startIndex);
        expect(c.barSpan).toBeGreaterThanOrEqual(5);
        if (k > 0) expect(c.startIndex).toBeGreaterThan(contractions[k - 1].endIndex);
      }
    }
  });
});
