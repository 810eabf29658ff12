import { describe, it, expect } from 'vitest';
import {
  baseLengthScore,
  combineConfidence,
  liquidityScore,
  relativeStrengthScore,
  symmetryScore
} from './confidence';

describe('confidence', () => {
  it('scores a perfect geometric decay as fully symmetric', () => {
    expect(symmetryScore([30, 15, 7.5])).toBeCloseTo(1, 9);
  });

  it('penalizes uneven decay', () => {
    const expected = (() => {
      const ideal = Math.sqrt(10 / 30);
      const dev = (Math.abs(17 / 30 - ideal) + Math.abs(10 / 17 - ideal)) / ideal / 2;
      return 1 - dev;
    })();
    expect(symmetryScore([30, 17, 10])).toBeCloseTo(expected, 9);
    expect(symmetryScore([30, 17, 10])).toBeCloseTo(0.9813, 3);
    expect(symmetryScore([30])).toBe(0);
  });

  it('favors bases of 7 to 15 weeks', () => {
    expect(baseLengthScore(35)).toBe(1);
    expect(baseLengthScore(75)).toBe(1);
    expect(baseLengthScore(17.5)).toBeCloseTo(0.5, 9);
    expect(baseLengthScore(112.5)).toBeCloseTo(0.5, 9);
    expect(baseLengthScore(150)).toBe(0);
  });

  it('treats missing RS as neutral', () => {
    expect(relativeStrengthScore(undefined)).toBe(0.5);
    expect(relativeStrengthScore(85)).toBeCloseTo(0.85, 9);
    expect(relativeStrengthScore(150)).toBe(1);
  });

  it('scales liquidity to the floor', () => {
    expect(liquidityScore(10_000_000, 20_000_000)).toBe(0.5);
    expect(liquidityScore(90_000_000, 20_000_000)).toBe(1);
    expect(liquidityScore(5, 0)).toBe(1);
  });

  it('combines scores with fixed weights', () => {
    expect(combineConfidence({ symmetry: 1, baseLength: 1, relativeStrength: 1, liquidity: 1 })).toBeCloseTo(1, 9);
    expect(combineConfidence({ symmetry: 0, baseLength: 0, relativeStrength: 0, liquidity: 0 })).toBe(0);
    expect(combineConfidence({ symmetry: 1, baseLength: 0, relativeStrength: 0, liquidity: 0 })).toBeCloseTo(0.35, 9);
    expect(combineConfidence({ symmetry: 0, baseLength: 0.5, relativeStrength: 1, liquidity: 0 })).toBeCloseTo(0.4, 9);
  });
});
