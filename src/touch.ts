import type {
  AgentResult,
  GestureFeatures,
  GestureListener,
  TouchAgent,
  TouchAgentConfig,
  TouchBaselines,
  TouchInput,
  TouchPhase,
  TouchState,
} from './types';
import { createWindow } from './buffer';
import { createEwma, EWMA_ALPHA, type EwmaStat } from './ewma';
import { createGestureSegmenter } from './gesture';
import {
  createLifecycle,
  createResult,
  createWarmup,
  INSUFFICIENT_DATA,
  NOT_ACTIVE,
  severityOf,
} from './agent';
import { deviationComponent, mean, zScore } from './utils';

export const TOUCH_AGENT_NAME = 'TouchAgent';

const DEFAULT_WINDOW_SIZE = 50;
const DEFAULT_WARMUP_THRESHOLD = 5;
/** Gestures required before any score is produced, independent of warmup. */
const MIN_SCORING_GESTURES = 5;

/**
 * Component weights. They sum to 1, and the total is NOT renormalized when a
 * component has no baseline variance yet: missing components just lower the score.
 */
export const TOUCH_WEIGHTS = {
  velocity: 0.25,
  pathDeviation: 0.20,
  tapDuration: 0.15,
  jitter: 0.15,
  pressure: 0.15,
  botPattern: 0.10,
} as const;

// ── Bot-pattern detector ──
const MIN_BOT_SAMPLES = 5;
const LINEAR_PATH_DEVIATION = 1.0;    // swipe straighter than this reads as scripted
const LINEAR_SHARE = 0.8;
const LINEAR_BONUS = 0.5;
const FAST_PEAK_VELOCITY = 5.0;       // px/ms
const FAST_SHARE = 0.6;
const FAST_BONUS = 0.3;
const TIMING_TOLERANCE_MS = 10;
const TIMING_SHARE = 0.9;
const TIMING_BONUS = 0.2;
const ROBOTIC_EXPLANATION_FLOOR = 0.3;

/**
 * Score in [0, 1] for scripted-input signatures across the gesture window:
 * near-perfectly straight swipes, sustained very high peak velocity, and
 * near-identical gesture durations.
 */
export function detectBotPatterns(gestures: readonly GestureFeatures[]): number {
  const n = gestures.length;
  if (n < MIN_BOT_SAMPLES) return 0;

  let score = 0;

  let linear = 0;
  let fast = 0;
  for (const g of gestures) {
    if (g.gestureType === 'SWIPE' && g.pathDeviation < LINEAR_PATH_DEVIATION) linear++;
    if (g.peakVelocity > FAST_PEAK_VELOCITY) fast++;
  }
  if (linear > n * LINEAR_SHARE) score += LINEAR_BONUS;
  if (fast > n * FAST_SHARE) score += FAST_BONUS;

  const avgDuration = mean(gestures.map((g) => g.durationMs));
  let similar = 0;
  for (const g of gestures) {
    if (Math.abs(g.durationMs - avgDuration) < TIMING_TOLERANCE_MS) similar++;
  }
  if (similar > n * TIMING_SHARE) score += TIMING_BONUS;

  return Math.min(1, score);
}

type TouchFeature = keyof TouchBaselines;

const FEATURES: TouchFeature[] = [
  'avgVelocity', 'peakVelocity', 'pathDeviation', 'tapDuration', 'jitter', 'pressure',
];

/** Plain window means of each tracked feature. */
type RecentTouchMetrics = Record<TouchFeature, number>;

function emptyRecents(): RecentTouchMetrics {
  return { avgVelocity: 0, peakVelocity: 0, pathDeviation: 0, tapDuration: 0, jitter: 0, pressure: 0 };
}

/**
 * Touch/gesture anomaly scorer. Raw pointer samples are grouped into gestures,
 * each gesture is reduced to a feature vector, and recent window means are
 * compared against EWMA baselines learned after warmup.
 */
export function createTouchAgent(config?: TouchAgentConfig): TouchAgent {
  const windowSize = config?.windowSize ?? DEFAULT_WINDOW_SIZE;
  const warmupThreshold = config?.warmupThreshold ?? DEFAULT_WARMUP_THRESHOLD;
  const alpha = config?.alpha ?? EWMA_ALPHA;
  const now = config?.now ?? (() => Date.now());
  const logger = config?.logger;

  const lifecycle = createLifecycle(TOUCH_AGENT_NAME, logger);
  const warmup = createWarmup(warmupThreshold);
  const segmenter = createGestureSegmenter();
  const gestures = createWindow<GestureFeatures>(windowSize);
  const listeners = new Set<GestureListener>();

  const baselines: Record<TouchFeature, EwmaStat> = {
    avgVelocity: createEwma(alpha),
    peakVelocity: createEwma(alpha),
    pathDeviation: createEwma(alpha),
    tapDuration: createEwma(alpha),
    jitter: createEwma(alpha),
    pressure: createEwma(alpha),
  };

  let recent = emptyRecents();

  function learn(g: GestureFeatures) {
    baselines.avgVelocity.update(g.avgVelocity);
    baselines.peakVelocity.update(g.peakVelocity);
    baselines.pathDeviation.update(g.pathDeviation);
    baselines.jitter.update(g.jitter);
    baselines.pressure.update(g.avgPressure);
    if (g.gestureType === 'TAP') baselines.tapDuration.update(g.durationMs);
  }

  function updateRecents() {
    const window = gestures.toArray();
    if (window.length === 0) return;
    const taps = window.filter((g) => g.gestureType === 'TAP');
    recent = {
      avgVelocity: mean(window.map((g) => g.avgVelocity)),
      peakVelocity: mean(window.map((g) => g.peakVelocity)),
      pathDeviation: mean(window.map((g) => g.pathDeviation)),
      jitter: mean(window.map((g) => g.jitter)),
      pressure: mean(window.map((g) => g.avgPressure)),
      tapDuration: mean(taps.map((g) => g.durationMs)),
    };
  }

  function notify(features: GestureFeatures) {
    for (const listener of listeners) {
      try {
        listener(features);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger?.log('WARN', 'GESTURE_LISTENER', `${TOUCH_AGENT_NAME} listener failed: ${message}`);
      }
    }
  }

  function completeGesture(features: GestureFeatures) {
    gestures.push(features);
    // The gesture that ends warmup is not learned from.
    if (!warmup.inWarmup) learn(features);
    updateRecents();
    notify(features);
    if (warmup.record()) lifecycle.note('completed warmup phase');
  }

  function ingest(kind: TouchPhase, pointerId: number, x: number, y: number, pressure: number, size: number) {
    if (!lifecycle.active) return;
    const sample = { kind, pointerId, x, y, pressure, size, timestamp: now() };
    if (kind === 'DOWN') {
      segmenter.down(sample);
    } else if (kind === 'MOVE') {
      segmenter.move(sample);
    } else {
      const features = segmenter.up(sample);
      if (features) completeGesture(features);
    }
  }

  /** Scaled deviation of a recent mean from its baseline; 0 while the baseline has no spread. */
  function component(feature: TouchFeature): number {
    const stat = baselines[feature];
    if (stat.variance <= 0) return 0;
    return deviationComponent(zScore(recent[feature], stat.mean, Math.sqrt(stat.variance)));
  }

  /** True when the recent mean sits more than `k` baseline standard deviations away. */
  function exceeds(feature: TouchFeature, k: number): boolean {
    const stat = baselines[feature];
    return stat.variance > 0 && Math.abs(recent[feature] - stat.mean) > k * Math.sqrt(stat.variance);
  }

  function computeScore(botScore: number): number {
    let score = 0;
    score += TOUCH_WEIGHTS.velocity * component('avgVelocity');
    score += TOUCH_WEIGHTS.pathDeviation * component('pathDeviation');
    if (recent.tapDuration > 0) score += TOUCH_WEIGHTS.tapDuration * component('tapDuration');
    score += TOUCH_WEIGHTS.jitter * component('jitter');
    score += TOUCH_WEIGHTS.pressure * component('pressure');
    score += TOUCH_WEIGHTS.botPattern * botScore;
    return score;
  }

  function explain(score: number, botScore: number): string[] {
    const severity = severityOf(score);
    if (severity === 'normal') return ['normal touch behavior patterns'];

    if (severity === 'moderate') {
      const out = ['moderate touch behavior anomalies detected'];
      if (exceeds('avgVelocity', 1)) out.push('unusual gesture velocity patterns');
      if (exceeds('pathDeviation', 1)) out.push('irregular swipe curvature');
      if (exceeds('jitter', 1)) out.push('elevated touch instability');
      return out;
    }

    const out = ['significant touch behavior anomalies'];
    if (botScore > ROBOTIC_EXPLANATION_FLOOR) out.push('robotic touch patterns detected');
    if (exceeds('avgVelocity', 2)) out.push('highly irregular gesture dynamics');
    if (recent.pathDeviation < LINEAR_PATH_DEVIATION) out.push('suspiciously linear touch paths');
    return out;
  }

  function getResult(): AgentResult {
    const timestamp = now();
    if (!lifecycle.active) return createResult(0, [NOT_ACTIVE], timestamp);
    if (warmup.inWarmup || warmup.count < MIN_SCORING_GESTURES) {
      return createResult(0, [INSUFFICIENT_DATA], timestamp);
    }
    const botScore = detectBotPatterns(gestures.toArray());
    const score = computeScore(botScore);
    return createResult(score, explain(score, botScore), timestamp);
  }

  function stop() {
    lifecycle.stop();
    segmenter.clear();
    gestures.clear();
  }

  function resetBaseline() {
    for (const f of FEATURES) baselines[f].reset();
    warmup.reset();
    segmenter.clear();
    gestures.clear();
    recent = emptyRecents();
    lifecycle.note('baseline reset');
  }

  function getState(): TouchState {
    return {
      baselines: {
        avgVelocity: baselines.avgVelocity.toBaseline(),
        peakVelocity: baselines.peakVelocity.toBaseline(),
        pathDeviation: baselines.pathDeviation.toBaseline(),
        tapDuration: baselines.tapDuration.toBaseline(),
        jitter: baselines.jitter.toBaseline(),
        pressure: baselines.pressure.toBaseline(),
      },
      totalGestures: warmup.count,
      inWarmup: warmup.inWarmup,
    };
  }

  function applyState(state: TouchState | null | undefined) {
    if (!state) return;
    for (const f of FEATURES) baselines[f].restore(state.baselines[f]);
    warmup.restore(state.totalGestures, state.inWarmup);
  }

  return {
    name: TOUCH_AGENT_NAME,
    start: () => lifecycle.start(),
    stop,
    isActive: () => lifecycle.active,
    getResult,
    resetBaseline,
    getState,
    applyState,
    onTouchDown: (pointerId, x, y, pressure, size) => ingest('DOWN', pointerId, x, y, pressure, size),
    onTouchMove: (pointerId, x, y, pressure, size) => ingest('MOVE', pointerId, x, y, pressure, size),
    onTouchUp: (pointerId, x, y, pressure, size) => ingest('UP', pointerId, x, y, pressure, size),
    add(input: TouchInput) {
      ingest(input.kind, input.pointerId, input.x, input.y, input.pressure, input.size);
    },
    onGesture(listener: GestureListener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
