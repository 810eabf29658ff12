/**
 * Confidence model for VCP detections: fixed linear combination of
 * normalized sub-scores. Pure functions only.
 */

import type { ConfidenceBreakdown } from '../types/detection';

export const CONFIDENCE_WEIGHTS: Readonly<ConfidenceBreakdown> = {
  symmetry: 0.35,
  baseLength: 0.2,
  relativeStrength: 0.3,
  liquidity: 0.15
};

/** Ideal base duration, weeks */
export const IDEAL_BASE_WEEKS = { min: 7, max: 15 } as const;

const BARS_PER_WEEK = 5;
const NEUTRAL_RS = 0.5;

export function clamp01(x: number): number {
  if (!Number.isFinite(x)) return 0;
  return Math.min(1, Math.max(0, x));
}

/**
 * How closely consecutive depth ratios track a geometric decay whose ratio
 * is their geometric mean: 1 - mean relative deviation.
 */
export function symmetryScore(depths: readonly number[]): number {
  if (depths.length < 2) return 0;
  const ratios: number[] = [];
  for (let i = 1; i < depths.length; i++) {
    if (depths[i - 1] <= 0) return 0;
    ratios.push(depths[i] / depths[i - 1]);
  }
  const ideal = Math.pow(depths[depths.length - 1] / depths[0], 1 / ratios.length);
  if (!(ideal > 0)) return 0;
  const deviation = ratios.reduce((s, r) => s + Math.abs(r - ideal) / ideal, 0) / ratios.length;
  return clamp01(1 - deviation);
}

export function baseLengthScore(baseBars: number): number {
  const weeks = baseBars / BARS_PER_WEEK;
  if (weeks < IDEAL_BASE_WEEKS.min) return clamp01(weeks / IDEAL_BASE_WEEKS.min);
  if (weeks > IDEAL_BASE_WEEKS.max) {
    return clamp01(1 - (weeks - IDEAL_BASE_WEEKS.max) / IDEAL_BASE_WEEKS.max);
  }
  return 1;
}

/** RS rating 0–100 from the caller; neutral when absent */
export function relativeStrengthScore(rsRating: number | undefined): number {
  if (rsRating === undefined || !Number.isFinite(rsRating)) return NEUTRAL_RS;
  return clamp01(rsRating / 100);
}

export function liquidityScore(avgDollarVolume: number, floor: number): number {
  if (floor <= 0) return 1;
  return clamp01(avgDollarVolume / floor);
}

export function combineConfidence(scores: ConfidenceBreakdown): number {
  const w = CONFIDENCE_WEIGHTS;
  return clamp01(
    w.symmetry * scores.symmetry +
      w.baseLength * scores.baseLength +
      w.relativeStrength * scores.relativeStrength +
      w.liquidity * scores.liquidity
  );
}
