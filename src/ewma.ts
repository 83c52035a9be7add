import type { Baseline } from './types';

/** Smoothing factor shared by every adaptive baseline. */
export const EWMA_ALPHA = 0.1;

export interface EwmaStat {
  /** Fold a new observation into the baseline and return the updated moments. */
  update(value: number): Baseline;
  readonly mean: number;
  readonly variance: number;
  /** Current moments as a plain record. */
  toBaseline(): Baseline;
  /** Overwrite both moments, e.g. from a persisted snapshot. */
  restore(baseline: Baseline): void;
  reset(): void;
}

/**
 * Exponentially weighted mean/variance accumulator.
 *
 * The variance term is an EWMA of the squared deviation from the mean *after*
 * it has absorbed the new value:
 *
 *   mean_t     = α·x + (1 − α)·mean_{t−1}
 *   variance_t = α·(x − mean_t)² + (1 − α)·variance_{t−1}
 *
 * Both moments start at 0, so early estimates are biased toward zero.
 */
export function createEwma(alpha: number = EWMA_ALPHA): EwmaStat {
  let m = 0;
  let v = 0;

  return {
    update(value: number): Baseline {
      m = alpha * value + (1 - alpha) * m;
      const d = value - m;
      v = alpha * d * d + (1 - alpha) * v;
      return { mean: m, variance: v };
    },

    get mean() {
      return m;
    },

    get variance() {
      return v;
    },

    toBaseline(): Baseline {
      return { mean: m, variance: v };
    },

    restore(baseline: Baseline) {
      m = baseline.mean;
      v = baseline.variance;
    },

    reset() {
      m = 0;
      v = 0;
    },
  };
}
