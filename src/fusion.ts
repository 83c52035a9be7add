import type { AgentKind, FusionResult, FusionWeights, RiskLevel } from './types';

export const DEFAULT_FUSION_WEIGHTS: Readonly<FusionWeights> = Object.freeze({
  touch: 0.5,
  typing: 0.3,
  usage: 0.2,
});

/** Fused scores at or below this are LOW. */
export const LOW_THRESHOLD = 0.4;
/** Fused scores above this are HIGH. */
export const HIGH_THRESHOLD = 0.7;

/**
 * Inputs are multiplied by this before the weighted average, so the fused
 * score ranges over [0, 10] rather than [0, 1].
 */
export const FUSION_SCALE = 10;

const HIGH_ANOMALY = 0.7;
const MODERATE_ANOMALY = 0.4;

export const NO_SIGNALS = 'no signals available';

const AGENT_ORDER: readonly AgentKind[] = ['touch', 'typing', 'usage'];

const RISK_EXPLANATIONS: Record<RiskLevel, string> = {
  LOW: 'risk score within normal range',
  MEDIUM: 'elevated risk requires verification',
  HIGH: 'high risk requires immediate action',
};

const RESPONSE_ACTIONS: Record<RiskLevel, string> = {
  LOW: 'Continue normal operation',
  MEDIUM: 'Request biometric verification',
  HIGH: 'Lock account and alert security team',
};

export function determineRiskLevel(score: number): RiskLevel {
  if (score <= LOW_THRESHOLD) return 'LOW';
  if (score <= HIGH_THRESHOLD) return 'MEDIUM';
  return 'HIGH';
}

export function responseAction(level: RiskLevel): string {
  return RESPONSE_ACTIONS[level];
}

function describeScore(agent: AgentKind, score: number): string {
  if (score > HIGH_ANOMALY) return `${agent} high anomaly`;
  if (score > MODERATE_ANOMALY) return `${agent} moderate anomaly`;
  return `${agent} normal`;
}

function describeStrategy(present: readonly AgentKind[]): string {
  const joined = present.join('+');
  if (present.length === 1) return `${joined}-only fusion`;
  if (present.length === 2) return `${joined} dual fusion`;
  return `${joined} triple fusion`;
}

/** Merge over the defaults, then scale to sum 1. A zero total is left as given. */
function normalizeWeights(weights?: Partial<FusionWeights>): FusionWeights {
  const merged: FusionWeights = {
    touch: weights?.touch ?? DEFAULT_FUSION_WEIGHTS.touch,
    typing: weights?.typing ?? DEFAULT_FUSION_WEIGHTS.typing,
    usage: weights?.usage ?? DEFAULT_FUSION_WEIGHTS.usage,
  };
  const total = merged.touch + merged.typing + merged.usage;
  if (total <= 0) return merged;
  return {
    touch: merged.touch / total,
    typing: merged.typing / total,
    usage: merged.usage / total,
  };
}

export interface FusionEngine {
  /** Combine whichever scores are present. Null or undefined means the stream is absent. */
  fuseScores(
    touch?: number | null,
    typing?: number | null,
    usage?: number | null,
  ): FusionResult;
  getWeights(): FusionWeights;
  updateWeights(weights: Partial<FusionWeights>): void;
}

export interface FusionEngineConfig {
  weights?: Partial<FusionWeights>;
  now?: () => number;
}

export function createFusionEngine(config?: FusionEngineConfig): FusionEngine {
  const now = config?.now ?? (() => Date.now());
  let weights = normalizeWeights(config?.weights);

  function fuseScores(
    touch?: number | null,
    typing?: number | null,
    usage?: number | null,
  ): FusionResult {
    const timestamp = now();
    const inputs: Record<AgentKind, number | null | undefined> = { touch, typing, usage };
    const present = AGENT_ORDER.filter((kind) => inputs[kind] != null);

    if (present.length === 0) {
      return Object.freeze({
        finalScore: 0,
        riskLevel: 'LOW',
        explanations: Object.freeze([NO_SIGNALS]),
        timestamp,
      });
    }

    const explanations: string[] = [];
    let weighted = 0;
    let totalWeight = 0;
    for (const kind of AGENT_ORDER) {
      const score = inputs[kind];
      if (score == null) continue;
      weighted += weights[kind] * score * FUSION_SCALE;
      totalWeight += weights[kind];
      explanations.push(describeScore(kind, score));
    }

    const finalScore = totalWeight > 0 ? weighted / totalWeight : weighted;
    const riskLevel = determineRiskLevel(finalScore);
    explanations.push(describeStrategy(present));
    explanations.push(RISK_EXPLANATIONS[riskLevel]);

    return Object.freeze({
      finalScore,
      riskLevel,
      explanations: Object.freeze(explanations),
      timestamp,
    });
  }

  return {
    fuseScores,
    getWeights: () => ({ ...weights }),
    updateWeights(next: Partial<FusionWeights>) {
      weights = normalizeWeights(next);
    },
  };
}

/** Pretty-printed JSON view of a fusion result, score to two decimals. */
export function fusionToJson(result: FusionResult): string {
  const explanations = result.explanations.map((e) => JSON.stringify(e)).join(', ');
  return [
    '{',
    `  "final_score": ${result.finalScore.toFixed(2)},`,
    `  "risk_level": "${result.riskLevel}",`,
    `  "timestamp": ${result.timestamp},`,
    `  "explanations": [${explanations}]`,
    '}',
  ].join('\n');
}
