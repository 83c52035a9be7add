import { createHash } from 'node:crypto';
import type { AgentResult, UsageAgent, UsageAgentConfig, UsageInput, UsageState } from './types';
import { createWindow, type BoundedWindow } from './buffer';
import { createEwma, EWMA_ALPHA } from './ewma';
import {
  createLifecycle,
  createResult,
  createWarmup,
  INSUFFICIENT_DATA,
  NOT_ACTIVE,
  severityOf,
} from './agent';
import { deviationComponent, EPSILON, mean, zScore } from './utils';

export const USAGE_AGENT_NAME = 'UsageAgent';

const DEFAULT_WARMUP_THRESHOLD = 20;
const MIN_SCORING_SESSIONS = 2;
const DEFAULT_SESSION_WINDOW = 100;
const DEFAULT_RATE_WINDOW_MS = 120_000;
/** Timestamps held per rate window; bursts beyond this saturate the rate. */
const RATE_EVENT_CAPACITY = 1024;
const MS_PER_MINUTE = 60_000;
/** Leading digest bytes kept when app identifiers are hashed. */
const APP_HASH_BYTES = 8;

const SHORT_SESSION_RATIO = 0.3;
const SWITCH_BURST_RATIO = 2;

/**
 * Component weights. Unlike touch and typing, this scorer divides by the sum
 * of the weights that actually applied.
 */
export const USAGE_WEIGHTS = {
  launchRate: 0.3,
  switchRate: 0.3,
  sessionDuration: 0.3,
  newApp: 0.1,
} as const;

/** Irreversible app identifier: first 8 bytes of its SHA-256 digest, hex encoded. */
export function hashAppId(appId: string): string {
  return createHash('sha256').update(appId, 'utf8').digest('hex').slice(0, APP_HASH_BYTES * 2);
}

interface Session {
  appId: string;
  start: number;
}

/**
 * App-usage anomaly scorer: launch and switch rates over a rolling time
 * window, session durations, and first-time app use.
 *
 * Baselines are learned on session close, not on each launch or switch: the
 * rate baselines absorb whatever rate was current when a session ended.
 */
export function createUsageAgent(config?: UsageAgentConfig): UsageAgent {
  const warmupThreshold = config?.warmupThreshold ?? DEFAULT_WARMUP_THRESHOLD;
  const sessionWindowSize = config?.sessionWindowSize ?? DEFAULT_SESSION_WINDOW;
  const rateWindowMs = config?.rateWindowMs ?? DEFAULT_RATE_WINDOW_MS;
  const hashAppIds = config?.hashAppIds ?? false;
  const alpha = config?.alpha ?? EWMA_ALPHA;
  const now = config?.now ?? (() => Date.now());

  const lifecycle = createLifecycle(USAGE_AGENT_NAME, config?.logger);
  const warmup = createWarmup(warmupThreshold);

  const launches = createWindow<number>(RATE_EVENT_CAPACITY);
  const switches = createWindow<number>(RATE_EVENT_CAPACITY);
  const durations = createWindow<number>(sessionWindowSize);
  const knownApps = new Set<string>();

  const launchBaseline = createEwma(alpha);
  const switchBaseline = createEwma(alpha);
  const durationBaseline = createEwma(alpha);

  let current: Session | null = null;
  let recentLaunchRate = 0;
  let recentSwitchRate = 0;
  let recentSessionMean = 0;
  let recentNewAppUsed = false;

  function normalizeAppId(appId: string | null | undefined): string {
    const id = appId ?? '';
    return hashAppIds ? hashAppId(id) : id;
  }

  function prune(timestamps: BoundedWindow<number>, t: number) {
    let oldest = timestamps.peekOldest();
    while (oldest !== undefined && t - oldest > rateWindowMs) {
      timestamps.shift();
      oldest = timestamps.peekOldest();
    }
  }

  function recompute(t: number) {
    prune(launches, t);
    prune(switches, t);
    const minutes = rateWindowMs / MS_PER_MINUTE;
    recentLaunchRate = launches.length / minutes;
    recentSwitchRate = switches.length / minutes;
    if (durations.length > 0) recentSessionMean = mean(durations.toArray());
  }

  function markAppSeen(appId: string) {
    if (knownApps.has(appId)) {
      recentNewAppUsed = false;
      return;
    }
    // New apps while the baseline is still forming are expected.
    recentNewAppUsed = !warmup.inWarmup;
    knownApps.add(appId);
  }

  function openSession(appId: string, t: number) {
    current = { appId, start: t };
  }

  function closeSession(session: Session, t: number) {
    const duration = Math.max(0, t - session.start);
    durations.push(duration);
    if (warmup.record()) lifecycle.note('completed warmup phase');
    if (!warmup.inWarmup) {
      launchBaseline.update(recentLaunchRate);
      switchBaseline.update(recentSwitchRate);
      durationBaseline.update(duration);
    }
    current = null;
  }

  function onAppOpened(appId: string | null | undefined) {
    if (!lifecycle.active) return;
    const id = normalizeAppId(appId);
    const t = now();
    launches.push(t);
    prune(launches, t);
    openSession(id, t);
    markAppSeen(id);
    recompute(t);
  }

  function onAppClosed(appId: string | null | undefined) {
    if (!lifecycle.active) return;
    const id = normalizeAppId(appId);
    const t = now();
    if (current && current.appId === id) closeSession(current, t);
    recompute(t);
  }

  function onAppSwitch(from: string | null | undefined, to: string | null | undefined) {
    if (!lifecycle.active) return;
    const t = now();
    switches.push(t);
    prune(switches, t);
    const fromId = normalizeAppId(from);
    if (current && current.appId === fromId) closeSession(current, t);
    const toId = normalizeAppId(to);
    openSession(toId, t);
    markAppSeen(toId);
    recompute(t);
  }

  function onScreenOff() {
    if (!lifecycle.active || !current) return;
    const t = now();
    closeSession(current, t);
    recompute(t);
  }

  /** Poisson-style deviation: a count rate's spread is taken as √mean. */
  function rateComponent(recent: number, baseline: number): number {
    return deviationComponent(zScore(recent, baseline, Math.sqrt(baseline)));
  }

  function computeScore(): number {
    let total = 0;
    let weightSum = 0;

    if (launchBaseline.mean > 0) {
      total += USAGE_WEIGHTS.launchRate * rateComponent(recentLaunchRate, launchBaseline.mean);
      weightSum += USAGE_WEIGHTS.launchRate;
    }
    if (switchBaseline.mean > 0) {
      total += USAGE_WEIGHTS.switchRate * rateComponent(recentSwitchRate, switchBaseline.mean);
      weightSum += USAGE_WEIGHTS.switchRate;
    }
    if (durationBaseline.variance > 0) {
      const z = zScore(recentSessionMean, durationBaseline.mean, Math.sqrt(durationBaseline.variance));
      total += USAGE_WEIGHTS.sessionDuration * deviationComponent(z);
      weightSum += USAGE_WEIGHTS.sessionDuration;
    }
    total += USAGE_WEIGHTS.newApp * (recentNewAppUsed ? 1 : 0);
    weightSum += USAGE_WEIGHTS.newApp;

    return weightSum > 0 ? Math.min(1, total / weightSum) : 0;
  }

  function rateOff(recent: number, baseline: number): boolean {
    return baseline > 0 && Math.abs(recent - baseline) > Math.sqrt(Math.max(EPSILON, baseline));
  }

  function explain(score: number): string[] {
    const severity = severityOf(score);
    if (severity === 'normal') return ['normal usage behavior'];

    if (severity === 'moderate') {
      const out = ['moderate usage anomalies detected'];
      if (rateOff(recentLaunchRate, launchBaseline.mean)) out.push('unusual app launch rate');
      if (rateOff(recentSwitchRate, switchBaseline.mean)) out.push('frequent app switching');
      if (
        durationBaseline.variance > 0 &&
        Math.abs(recentSessionMean - durationBaseline.mean) > Math.sqrt(durationBaseline.variance)
      ) {
        out.push('atypical session durations');
      }
      if (recentNewAppUsed) out.push('previously unseen app used');
      return out;
    }

    const out = ['significant usage behavior anomalies'];
    if (recentSwitchRate > switchBaseline.mean * SWITCH_BURST_RATIO) out.push('rapid task switching bursts');
    if (recentSessionMean < durationBaseline.mean * SHORT_SESSION_RATIO) out.push('very short sessions');
    if (recentNewAppUsed) out.push('new/unrecognized app detected');
    return out;
  }

  function getResult(): AgentResult {
    const timestamp = now();
    if (!lifecycle.active) return createResult(0, [NOT_ACTIVE], timestamp);
    if (warmup.inWarmup || warmup.count < MIN_SCORING_SESSIONS) {
      return createResult(0, [INSUFFICIENT_DATA], timestamp);
    }
    const score = computeScore();
    return createResult(score, explain(score), timestamp);
  }

  function clearWindows() {
    launches.clear();
    switches.clear();
    durations.clear();
    current = null;
  }

  function stop() {
    lifecycle.stop();
    clearWindows();
  }

  function resetBaseline() {
    launchBaseline.reset();
    switchBaseline.reset();
    durationBaseline.reset();
    warmup.reset();
    clearWindows();
    knownApps.clear();
    recentLaunchRate = 0;
    recentSwitchRate = 0;
    recentSessionMean = 0;
    recentNewAppUsed = false;
    lifecycle.note('baseline reset');
  }

  function getState(): UsageState {
    return {
      baselines: {
        launchRate: launchBaseline.toBaseline(),
        switchRate: switchBaseline.toBaseline(),
        sessionDuration: durationBaseline.toBaseline(),
      },
      totalSessions: warmup.count,
      inWarmup: warmup.inWarmup,
    };
  }

  function applyState(state: UsageState | null | undefined) {
    if (!state) return;
    launchBaseline.restore(state.baselines.launchRate);
    switchBaseline.restore(state.baselines.switchRate);
    durationBaseline.restore(state.baselines.sessionDuration);
    warmup.restore(state.totalSessions, state.inWarmup);
  }

  function add(input: UsageInput) {
    switch (input.kind) {
      case 'APP_OPENED':
        onAppOpened(input.appId);
        break;
      case 'APP_CLOSED':
        onAppClosed(input.appId);
        break;
      case 'APP_SWITCH':
        onAppSwitch(input.from, input.to);
        break;
      case 'SCREEN_OFF':
        onScreenOff();
        break;
      case 'SCREEN_ON':
      case 'UNLOCK':
        break;
    }
  }

  return {
    name: USAGE_AGENT_NAME,
    start: () => lifecycle.start(),
    stop,
    isActive: () => lifecycle.active,
    getResult,
    resetBaseline,
    getState,
    applyState,
    onAppOpened,
    onAppClosed,
    onAppSwitch,
    // Accepted for interface completeness; screen-on and unlock carry no signal yet.
    onScreenOn: () => {},
    onScreenOff,
    onUnlock: () => {},
    add,
  };
}
