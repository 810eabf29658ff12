import { describe, it, expect } from 'vitest';
import { VolumeProfileAnalyzer } from './volumeProfile';
import { buildSeries, vcpSeries } from '../test/series';

describe('VolumeProfileAnalyzer', () => {
  const analyzer = new VolumeProfileAnalyzer({
    dryUpBars: 10,
    baseLookback: 50,
    dryUpPercentile: 10,
    breakoutMultiplier: 1.4,
    breakoutSmaPeriod: 50,
    thinVolume: 0
  });

  describe('percentileThreshold', () => {
    const volumes = [100, 90, 80, 70, 60, 50, 40, 30, 20, 10];

    it('uses the nearest rank', () => {
      expect(analyzer.percentileThreshold(volumes, 10)).toBe(10);
      expect(analyzer.percentileThreshold(volumes, 50)).toBe(50);
      expect(analyzer.percentileThreshold(volumes, 100)).toBe(100);
    });

    it('leaves zero-volume bars out', () => {
      expect(analyzer.percentileThreshold([0, 0, 5, 10], 10)).toBe(5);
      expect(analyzer.percentileThreshold([0, 0], 10)).toBeNull();
    });
  });

  it('detects the dry-up in the tail of the base', () => {
    const result = analyzer.checkDryUp(vcpSeries(), 88);
    expect(result).toEqual({
      dryUp: true,
      avgVolume: 400_000,
      threshold: 400_000,
      windowStart: 79,
      windowEnd: 88,
      baseStart: 39
    });
  });

  it('rejects a tail that trades above the bottom decile', () => {
    const candles = vcpSeries().map((c, i) => (i >= 79 && i <= 88 ? { ...c, volume: 1_200_000 } : c));
    const result = analyzer.checkDryUp(candles, 88);
    expect(result.dryUp).toBe(false);
    expect(result.threshold).toBe(1_000_000);
    expect(result.avgVolume).toBe(1_200_000);
  });

  it('needs a full dry-up window', () => {
    const candles = vcpSeries();
    expect(analyzer.checkDryUp(candles, 5).dryUp).toBe(false);
  });

  it('confirms the breakout against the SMA of prior bars', () => {
    const result = analyzer.checkBreakout(vcpSeries(), 89);
    expect(result.confirmed).toBe(true);
    expect(result.volume).toBe(1_408_000);
    expect(result.averageVolume).toBeCloseTo(880_000, 6);
    expect(result.ratio).toBeCloseTo(1.6, 9);
  });

  it('does not confirm a breakout on ordinary volume', () => {
    const candles = vcpSeries();
    candles[89] = { ...candles[89], volume: 1_000_000 };
    const result = analyzer.checkBreakout(candles, 89);
    expect(result.confirmed).toBe(false);
    expect(result.ratio).toBeCloseTo(1_000_000 / 880_000, 9);
  });

  it('has no average without enough history', () => {
    expect(analyzer.checkBreakout(vcpSeries(), 49)).toEqual({
      confirmed: false,
      volume: 1_000_000,
      averageVolume: null,
      ratio: null
    });
  });

  it('averages dollar volume over the trailing bars', () => {
    const candles = buildSeries([10, 10, 20, 20], [100, 0, 100, 300]);
    // бар с нулевым объёмом не учитывается
    expect(analyzer.averageDollarVolume(candles, 3)).toBe(4000);
    expect(analyzer.averageVolume(candles, 0, 3)).toBeCloseTo(500 / 3, 9);
  });
});
