import type { FusionResult, RiskLevel } from './types';

const DEFAULT_MIN_SCORE_DELTA = 0.1;
const DEFAULT_MIN_INTERVAL_MS = 60_000;
const DEFAULT_ESCALATION_STREAK = 3;
const DEFAULT_ESCALATION_INTERVAL_MS = 120_000;

export interface AlertPolicyConfig {
  /** Rise in fused score that re-alerts at an unchanged level. Default: 0.10 */
  minScoreDelta?: number;
  /** Quiet period after an alert. Default: 60000 */
  minIntervalMs?: number;
  /** Consecutive HIGH results before escalating. Default: 3 */
  escalationStreak?: number;
  /** Quiet period after an escalation. Default: 120000 */
  escalationIntervalMs?: number;
}

export interface AlertDecision {
  alert: boolean;
  escalate: boolean;
}

export interface AlertPolicy {
  /** Feed one fusion result, in time order. Timing uses the result's own timestamp. */
  evaluate(result: FusionResult): AlertDecision;
  reset(): void;
}

/**
 * Rate-limits risk notifications. MEDIUM and HIGH results alert on a level
 * change or a sufficient score rise; sustained HIGH results escalate.
 */
export function createAlertPolicy(config?: AlertPolicyConfig): AlertPolicy {
  const minScoreDelta = config?.minScoreDelta ?? DEFAULT_MIN_SCORE_DELTA;
  const minIntervalMs = config?.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS;
  const escalationStreak = config?.escalationStreak ?? DEFAULT_ESCALATION_STREAK;
  const escalationIntervalMs = config?.escalationIntervalMs ?? DEFAULT_ESCALATION_INTERVAL_MS;

  let lastLevel: RiskLevel | null = null;
  let lastScore = 0;
  let lastAlertAt: number | undefined;

  let highStreak = 0;
  let lastEscalationAt: number | undefined;

  function shouldAlert(result: FusionResult): boolean {
    if (result.riskLevel === 'LOW') {
      lastLevel = null;
      return false;
    }
    const t = result.timestamp;
    const intervalOk = lastAlertAt === undefined || t - lastAlertAt >= minIntervalMs;
    const levelChanged = lastLevel !== result.riskLevel;
    const scoreJumped = result.finalScore - lastScore >= minScoreDelta;
    if (!(levelChanged || scoreJumped) || !intervalOk) return false;

    lastLevel = result.riskLevel;
    lastScore = result.finalScore;
    lastAlertAt = t;
    return true;
  }

  function shouldEscalate(result: FusionResult): boolean {
    highStreak = result.riskLevel === 'HIGH' ? highStreak + 1 : 0;
    const t = result.timestamp;
    const intervalOk = lastEscalationAt === undefined || t - lastEscalationAt >= escalationIntervalMs;
    if (highStreak < escalationStreak || !intervalOk) return false;

    lastEscalationAt = t;
    highStreak = 0;
    return true;
  }

  return {
    evaluate(result: FusionResult): AlertDecision {
      return { alert: shouldAlert(result), escalate: shouldEscalate(result) };
    },
    reset() {
      lastLevel = null;
      lastScore = 0;
      lastAlertAt = undefined;
      highStreak = 0;
      lastEscalationAt = undefined;
    },
  };
}
