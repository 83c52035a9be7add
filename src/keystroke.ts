import type { AgentResult, TypingAgent, TypingAgentConfig, TypingState } from './types';
import { createWindow } from './buffer';
import { createEwma, EWMA_ALPHA } from './ewma';
import {
  createLifecycle,
  createResult,
  createWarmup,
  INSUFFICIENT_DATA,
  NOT_ACTIVE,
  severityOf,
} from './agent';
import { deviationComponent, mean, zScore } from './utils';

export const TYPING_AGENT_NAME = 'TypingAgent';

export const BACKSPACE_KEY_CODE = 8;
export const DELETE_KEY_CODE = 67;

const DEFAULT_WINDOW_SIZE = 50;
const DEFAULT_WARMUP_THRESHOLD = 100;
const MIN_SCORING_KEYSTROKES = 5;

/** Key-downs closer together than this are treated as a paste-like burst. */
const PASTE_INTERVAL_MS = 10;
/** Backspace share at which the correction component saturates. */
const BACKSPACE_RATE_CAP = 0.3;
const BACKSPACE_ELEVATION = 2;
const CORRECTION_EXPLANATION_ELEVATION = 1.5;
const HIGH_ERROR_RATE = 0.2;

/** Component weights; like touch, the sum is not renormalized when components drop out. */
export const TYPING_WEIGHTS = {
  dwell: 0.3,
  flight: 0.3,
  backspace: 0.2,
  paste: 0.2,
} as const;

interface KeyRecord {
  isKeyDown: boolean;
  keyCode: number;
}

function isCorrectionKey(keyCode: number): boolean {
  return keyCode === BACKSPACE_KEY_CODE || keyCode === DELETE_KEY_CODE;
}

/**
 * Keystroke-dynamics anomaly scorer. Only timing and the backspace/delete
 * distinction are derived from key codes; no text is ever reconstructed.
 *
 * - dwell: key-up minus the preceding key-down, when both carry the same key code
 * - flight: key-down minus the previous key-down, regardless of key code
 */
export function createTypingAgent(config?: TypingAgentConfig): TypingAgent {
  const windowSize = config?.windowSize ?? DEFAULT_WINDOW_SIZE;
  const warmupThreshold = config?.warmupThreshold ?? DEFAULT_WARMUP_THRESHOLD;
  const alpha = config?.alpha ?? EWMA_ALPHA;
  const now = config?.now ?? (() => Date.now());

  const lifecycle = createLifecycle(TYPING_AGENT_NAME, config?.logger);
  const warmup = createWarmup(warmupThreshold);

  // Down and up records, so twice the sample window.
  const events = createWindow<KeyRecord>(windowSize * 2);
  const dwells = createWindow<number>(windowSize);
  const flights = createWindow<number>(windowSize);

  const dwellBaseline = createEwma(alpha);
  const flightBaseline = createEwma(alpha);
  // Not learned from input; changes only through applyState and resetBaseline.
  const backspaceBaseline = createEwma(alpha);

  let lastDownAt: number | undefined;
  let lastKeyCode: number | undefined;
  // Reflects only the most recent event.
  let pasteBurst = false;

  let recentDwellMean = 0;
  let recentFlightMean = 0;
  let recentBackspaceRate = 0;

  function updateRecents() {
    if (dwells.length > 0) recentDwellMean = mean(dwells.toArray());
    if (flights.length > 0) recentFlightMean = mean(flights.toArray());

    let corrections = 0;
    events.forEach((e) => {
      if (e.isKeyDown && isCorrectionKey(e.keyCode)) corrections++;
    });
    recentBackspaceRate = events.length > 0 ? corrections / events.length : 0;
  }

  function onKeyEvent(isKeyDown: boolean, keyCode: number) {
    if (!lifecycle.active) return;

    const timestamp = now();
    const learning = !warmup.inWarmup;
    events.push({ isKeyDown, keyCode });
    pasteBurst = false;

    if (isKeyDown) {
      if (lastDownAt !== undefined) {
        const flight = timestamp - lastDownAt;
        flights.push(flight);
        if (learning) flightBaseline.update(flight);
        pasteBurst = flight < PASTE_INTERVAL_MS;
      }
      lastDownAt = timestamp;
      lastKeyCode = keyCode;
    } else if (lastDownAt !== undefined && keyCode === lastKeyCode) {
      const dwell = timestamp - lastDownAt;
      dwells.push(dwell);
      if (learning) dwellBaseline.update(dwell);
    }

    updateRecents();

    if (isKeyDown && warmup.record()) lifecycle.note('completed warmup phase');
  }

  function exceeds(recent: number, center: number, variance: number, k: number): boolean {
    return variance > 0 && Math.abs(recent - center) > k * Math.sqrt(variance);
  }

  function computeScore(): number {
    let score = 0;
    if (dwellBaseline.variance > 0 && dwells.length > 0) {
      const z = zScore(recentDwellMean, dwellBaseline.mean, Math.sqrt(dwellBaseline.variance));
      score += TYPING_WEIGHTS.dwell * deviationComponent(z);
    }
    if (flightBaseline.variance > 0 && flights.length > 0) {
      const z = zScore(recentFlightMean, flightBaseline.mean, Math.sqrt(flightBaseline.variance));
      score += TYPING_WEIGHTS.flight * deviationComponent(z);
    }
    if (recentBackspaceRate > backspaceBaseline.mean * BACKSPACE_ELEVATION) {
      score += TYPING_WEIGHTS.backspace * Math.min(1, recentBackspaceRate / BACKSPACE_RATE_CAP);
    }
    if (pasteBurst) score += TYPING_WEIGHTS.paste;
    return score;
  }

  function explain(score: number): string[] {
    const severity = severityOf(score);
    if (severity === 'normal') return ['normal typing rhythm'];

    const dwellOff = (k: number) =>
      exceeds(recentDwellMean, dwellBaseline.mean, dwellBaseline.variance, k);

    if (severity === 'moderate') {
      const out = ['moderate typing anomalies detected'];
      if (dwellOff(1)) out.push('irregular key hold times');
      if (exceeds(recentFlightMean, flightBaseline.mean, flightBaseline.variance, 1)) {
        out.push('unusual inter-key timing');
      }
      if (recentBackspaceRate > backspaceBaseline.mean * CORRECTION_EXPLANATION_ELEVATION) {
        out.push('elevated correction rate');
      }
      return out;
    }

    const out = ['significant typing behavior anomalies'];
    if (pasteBurst) out.push('rapid input detected');
    if (recentBackspaceRate > HIGH_ERROR_RATE) out.push('high error rate');
    if (dwellOff(2)) out.push('highly irregular key timing');
    return out;
  }

  function getResult(): AgentResult {
    const timestamp = now();
    if (!lifecycle.active) return createResult(0, [NOT_ACTIVE], timestamp);
    if (warmup.inWarmup || warmup.count < MIN_SCORING_KEYSTROKES) {
      return createResult(0, [INSUFFICIENT_DATA], timestamp);
    }
    const score = computeScore();
    return createResult(score, explain(score), timestamp);
  }

  function clearWindows() {
    events.clear();
    dwells.clear();
    flights.clear();
    lastDownAt = undefined;
    lastKeyCode = undefined;
    pasteBurst = false;
  }

  function stop() {
    lifecycle.stop();
    clearWindows();
  }

  function resetBaseline() {
    dwellBaseline.reset();
    flightBaseline.reset();
    backspaceBaseline.reset();
    warmup.reset();
    clearWindows();
    recentDwellMean = 0;
    recentFlightMean = 0;
    recentBackspaceRate = 0;
    lifecycle.note('baseline reset');
  }

  function getState(): TypingState {
    return {
      baselines: {
        dwell: dwellBaseline.toBaseline(),
        flight: flightBaseline.toBaseline(),
        backspaceRate: backspaceBaseline.toBaseline(),
      },
      totalKeystrokes: warmup.count,
      inWarmup: warmup.inWarmup,
    };
  }

  function applyState(state: TypingState | null | undefined) {
    if (!state) return;
    dwellBaseline.restore(state.baselines.dwell);
    flightBaseline.restore(state.baselines.flight);
    backspaceBaseline.restore(state.baselines.backspaceRate);
    warmup.restore(state.totalKeystrokes, state.inWarmup);
  }

  return {
    name: TYPING_AGENT_NAME,
    start: () => lifecycle.start(),
    stop,
    isActive: () => lifecycle.active,
    getResult,
    resetBaseline,
    getState,
    applyState,
    onKeyEvent,
  };
}
