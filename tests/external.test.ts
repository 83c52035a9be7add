import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  failedScore,
  gestureFeatureMap,
  scoreWithTimeout,
  type ExternalScoreResult,
  type ExternalScorer,
} from '../src/external';
import { gestureFeatures } from './fixtures/touch';

const OK: ExternalScoreResult = { ok: true, score: 0.82, mse: 0.031, threshold: 0.05, error: null };

function scorerOf(score: ExternalScorer['score']): ExternalScorer {
  return { score };
}

describe('scoreWithTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('passes the features through and returns the model result', async () => {
    const score = vi.fn(async () => OK);
    const result = await scoreWithTimeout(scorerOf(score), { avg_velocity: 1.5 }, 1_000);
    expect(result).toEqual(OK);
    expect(score).toHaveBeenCalledWith({ avg_velocity: 1.5 });
  });

  it('maps a timeout to a failed result', async () => {
    vi.useFakeTimers();
    const pending = scoreWithTimeout(scorerOf(() => new Promise<ExternalScoreResult>(() => {})), {}, 100);
    await vi.advanceTimersByTimeAsync(100);
    await expect(pending).resolves.toEqual(failedScore('timeout after 100ms'));
  });

  it('clears its timer once the model answers', async () => {
    vi.useFakeTimers();
    const result = await scoreWithTimeout(scorerOf(async () => OK), {}, 1_000);
    expect(result).toEqual(OK);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('waits indefinitely when the timeout is zero', async () => {
    vi.useFakeTimers();
    const slow = () =>
      new Promise<ExternalScoreResult>((resolve) => {
        setTimeout(() => resolve(OK), 5_000);
      });
    const pending = scoreWithTimeout(scorerOf(slow), {}, 0);
    await vi.advanceTimersByTimeAsync(5_000);
    await expect(pending).resolves.toEqual(OK);
  });

  it('maps a rejection to a failed result', async () => {
    const result = await scoreWithTimeout(
      scorerOf(async () => {
        throw new Error('model offline');
      }),
      {},
      1_000,
    );
    expect(result).toEqual({ ok: false, score: 0, mse: 0, threshold: 0, error: 'model offline' });
  });

  it('maps a synchronous throw to a failed result', async () => {
    const result = await scoreWithTimeout(
      scorerOf(() => {
        throw new Error('not loaded');
      }),
      {},
      1_000,
    );
    expect(result.error).toBe('not loaded');
  });

  it('stringifies non-Error rejections', async () => {
    const result = await scoreWithTimeout(scorerOf(() => Promise.reject('unavailable')), {}, 1_000);
    expect(result.error).toBe('unavailable');
  });

  it('rejects non-finite scores', async () => {
    const result = await scoreWithTimeout(scorerOf(async () => ({ ...OK, score: Number.NaN })), {}, 1_000);
    expect(result).toEqual(failedScore('non-finite score'));
  });
});

describe('gestureFeatureMap', () => {
  it('keys numeric features by column name', () => {
    const features = gestureFeatures({ durationMs: 320, directionChanges: 2, jitter: 1.5 });
    expect(gestureFeatureMap(features)).toEqual({
      duration_ms: 320,
      total_distance: 200,
      avg_velocity: 1,
      peak_velocity: 1,
      avg_pressure: 0.5,
      peak_pressure: 0.5,
      path_deviation: 10,
      direction_changes: 2,
      jitter: 1.5,
    });
  });
});
