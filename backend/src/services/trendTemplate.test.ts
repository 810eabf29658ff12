import { describe, it, expect } from 'vitest';
import { evaluateTrendTemplate } from './trendTemplate';
import { buildSeries, risingSeries, vcpSeries } from '../test/series';

describe('evaluateTrendTemplate', () => {
  it('passes all criteria in a steady year-long uptrend', () => {
    const result = evaluateTrendTemplate(risingSeries(260));
    expect(result.criteria).toEqual([true, true, true, true, true, true, true, true]);
    expect(result.passed).toBe(8);
  });

  it('fails a flat market except the distance-to-high check', () => {
    const flat = buildSeries(new Array<number>(260).fill(100), () => 1_000_000);
    const result = evaluateTrendTemplate(flat);
    expect(result.criteria).toEqual([false, false, false, false, false, false, true, false]);
    expect(result.passed).toBe(1);
  });

  it('cannot confirm the long averages on a short history', () => {
    const result = evaluateTrendTemplate(vcpSeries());
    expect(result.criteria).toEqual([false, false, false, false, true, true, true, true]);
    expect(result.passed).toBe(4);
  });
});
