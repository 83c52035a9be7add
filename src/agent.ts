import type { AgentResult, ResultLogger } from './types';
import { clamp } from './utils';

export const NOT_ACTIVE = 'agent not active';
export const INSUFFICIENT_DATA = 'insufficient data for analysis';

/** Scores below this read as normal behavior. */
export const MODERATE_THRESHOLD = 0.3;
/** Scores at or above this read as significant anomalies. */
export const SIGNIFICANT_THRESHOLD = 0.6;

export type Severity = 'normal' | 'moderate' | 'significant';

export function severityOf(score: number): Severity {
  if (score < MODERATE_THRESHOLD) return 'normal';
  if (score < SIGNIFICANT_THRESHOLD) return 'moderate';
  return 'significant';
}

/** Build an immutable result, clamping the score into [0, 1] (NaN reads as 0). */
export function createResult(
  score: number,
  explanations: readonly string[],
  timestamp: number,
): AgentResult {
  return Object.freeze({
    score: Number.isNaN(score) ? 0 : clamp(score, 0, 1),
    explanations: Object.freeze([...explanations]),
    timestamp,
  });
}

export interface Lifecycle {
  readonly active: boolean;
  start(): void;
  stop(): void;
  /** Report a lifecycle transition to the configured logger. */
  note(message: string): void;
}

export function createLifecycle(name: string, logger?: ResultLogger): Lifecycle {
  let active = false;

  function note(message: string) {
    logger?.log('INFO', 'LIFECYCLE', `${name} ${message}`);
  }

  return {
    get active() {
      return active;
    },
    start() {
      active = true;
      note('started monitoring');
    },
    stop() {
      active = false;
      note('stopped monitoring');
    },
    note,
  };
}

export interface Warmup {
  readonly count: number;
  readonly inWarmup: boolean;
  /** Count one observation. Returns true on the observation that ends warmup. */
  record(): boolean;
  restore(count: number, inWarmup: boolean): void;
  reset(): void;
}

/**
 * Observation counter gating baseline learning. Warmup ends once `threshold`
 * observations have been recorded and only restarts through reset().
 */
export function createWarmup(threshold: number): Warmup {
  let count = 0;
  let inWarmup = true;

  return {
    get count() {
      return count;
    },
    get inWarmup() {
      return inWarmup;
    },
    record(): boolean {
      count++;
      if (inWarmup && count >= threshold) {
        inWarmup = false;
        return true;
      }
      return false;
    },
    restore(nextCount: number, nextInWarmup: boolean) {
      count = nextCount;
      inWarmup = nextInWarmup;
    },
    reset() {
      count = 0;
      inWarmup = true;
    },
  };
}
