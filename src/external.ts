import type { GestureFeatures } from './types';

/** Outcome of an out-of-process model call. Failures are values, never exceptions. */
export interface ExternalScoreResult {
  ok: boolean;
  /** Anomaly score as reported by the model */
  score: number;
  /** Reconstruction error, for autoencoder-style models */
  mse: number;
  /** The model's own decision threshold on `mse` */
  threshold: number;
  error: string | null;
}

export interface ExternalScorer {
  score(features: Record<string, number>): Promise<ExternalScoreResult>;
}

export function failedScore(error: string): ExternalScoreResult {
  return { ok: false, score: 0, mse: 0, threshold: 0, error };
}

/**
 * Call an external scorer, mapping timeouts, rejections and non-finite scores
 * to `ok: false` results. `timeoutMs <= 0` waits indefinitely.
 */
export async function scoreWithTimeout(
  scorer: ExternalScorer,
  features: Record<string, number>,
  timeoutMs: number,
): Promise<ExternalScoreResult> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    // Defer so a synchronous throw inside score() becomes a rejection.
    const pending = Promise.resolve().then(() => scorer.score(features));
    const deadline = new Promise<never>((_, reject) => {
      if (timeoutMs > 0) {
        timer = setTimeout(() => reject(new Error(`timeout after ${timeoutMs}ms`)), timeoutMs);
      }
    });
    const result = await Promise.race([pending, deadline]);
    if (!Number.isFinite(result.score)) return failedScore('non-finite score');
    return result;
  } catch (err) {
    return failedScore(err instanceof Error ? err.message : String(err));
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}

/** Numeric gesture features keyed by their CSV column names. */
export function gestureFeatureMap(features: GestureFeatures): Record<string, number> {
  return {
    duration_ms: features.durationMs,
    total_distance: features.totalDistance,
    avg_velocity: features.avgVelocity,
    peak_velocity: features.peakVelocity,
    avg_pressure: features.avgPressure,
    peak_pressure: features.peakPressure,
    path_deviation: features.pathDeviation,
    direction_changes: features.directionChanges,
    jitter: features.jitter,
  };
}
