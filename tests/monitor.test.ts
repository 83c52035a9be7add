import { describe, it, expect, vi, afterEach } from 'vitest';
import { createRiskMonitor, type Evaluation } from '../src/monitor';
import { createMemoryStateStore, encodeState } from '../src/state';
import { createTouchAgent } from '../src/touch';
import { createResultLogger } from '../src/log';
import { failedScore, type ExternalScoreResult } from '../src/external';
import type { UsageState } from '../src/types';
import { createClock } from './fixtures/touch';
import { createSpyLogger } from './fixtures/logger';

const ZERO = { mean: 0, variance: 0 };

const learnedUsage: UsageState = {
  baselines: { launchRate: { mean: 0.5, variance: 0 }, switchRate: ZERO, sessionDuration: ZERO },
  totalSessions: 50,
  inWarmup: false,
};

describe('createRiskMonitor', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('treats stopped agents as absent signals', () => {
    const clock = createClock(5_000);
    const monitor = createRiskMonitor({ now: clock.now });
    const evaluation = monitor.evaluate();

    expect(evaluation.scores).toEqual({ touch: null, typing: null, usage: null });
    expect(evaluation.fusion).toEqual({
      finalScore: 0,
      riskLevel: 'LOW',
      explanations: ['no signals available'],
      timestamp: 5_000,
    });
    expect(evaluation.action).toBe('Continue normal operation');
    expect(evaluation.alert).toBe(false);
    expect(evaluation.escalate).toBe(false);
  });

  it('fuses every active agent and logs their results', () => {
    const clock = createClock(0);
    const logger = createSpyLogger();
    const monitor = createRiskMonitor({ now: clock.now, logger });
    monitor.start();

    const evaluation = monitor.evaluate();
    expect(evaluation.scores).toEqual({ touch: 0, typing: 0, usage: 0 });
    expect(evaluation.fusion.explanations).toEqual([
      'touch normal',
      'typing normal',
      'usage normal',
      'touch+typing+usage triple fusion',
      'risk score within normal range',
    ]);
    expect(logger.logAgentResult.mock.calls.map(([name]) => name)).toEqual([
      'TouchAgent',
      'TypingAgent',
      'UsageAgent',
    ]);
    expect(logger.logFusionResult).toHaveBeenCalledWith(evaluation.fusion, evaluation.scores);
    expect(logger.logResponseAction).not.toHaveBeenCalled();
  });

  it('logs a response action when the policy alerts', () => {
    const clock = createClock(0);
    const logger = createSpyLogger();
    const monitor = createRiskMonitor({ now: clock.now, logger });
    monitor.start();
    monitor.usage.applyState(learnedUsage);
    monitor.usage.onAppOpened('mail');

    // Usage scores 0.25 for a new app: 0.2 × 2.5 over a total weight of 1
    const evaluation = monitor.evaluate();
    expect(evaluation.fusion.finalScore).toBeCloseTo(0.5, 10);
    expect(evaluation.fusion.riskLevel).toBe('MEDIUM');
    expect(evaluation.action).toBe('Request biometric verification');
    expect(evaluation.alert).toBe(true);
    expect(logger.logResponseAction).toHaveBeenCalledWith(
      'MEDIUM',
      'Request biometric verification',
      'score=0.50',
    );
  });

  it('escalates sustained HIGH risk', () => {
    const clock = createClock(0);
    const logger = createSpyLogger();
    const monitor = createRiskMonitor({ now: clock.now, logger });
    monitor.start();
    monitor.touch.stop();
    monitor.typing.stop();
    monitor.usage.applyState(learnedUsage);
    monitor.usage.onAppOpened('mail');

    const decisions = [0, 1_000, 2_000].map((t) => {
      clock.set(t);
      const { alert, escalate } = monitor.evaluate();
      return { alert, escalate };
    });

    expect(decisions).toEqual([
      { alert: true, escalate: false },
      { alert: false, escalate: false },
      { alert: false, escalate: true },
    ]);
    expect(logger.log).toHaveBeenLastCalledWith('WARN', 'ESCALATION', 'sustained HIGH risk, score=2.500');
  });

  it('survives a failing evaluation listener', () => {
    const logger = createSpyLogger();
    const monitor = createRiskMonitor({
      now: () => 0,
      logger,
      onEvaluation: () => {
        throw new Error('sink down');
      },
    });

    expect(monitor.evaluate().fusion.riskLevel).toBe('LOW');
    expect(logger.log).toHaveBeenLastCalledWith('WARN', 'EVALUATION_LISTENER', 'listener failed: sink down');
  });

  it('passes configured weights to the fusion engine', () => {
    const monitor = createRiskMonitor({ weights: { touch: 1, typing: 1, usage: 2 } });
    expect(monitor.fusion.getWeights()).toEqual({ touch: 0.25, typing: 0.25, usage: 0.5 });
  });
});

describe('scheduling', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('evaluates on an interval while running', () => {
    vi.useFakeTimers();
    const seen: Evaluation[] = [];
    const monitor = createRiskMonitor({
      scheduling: 'interval',
      intervalMs: 1_000,
      onEvaluation: (evaluation) => seen.push(evaluation),
    });

    monitor.start();
    monitor.start();
    expect(monitor.isRunning()).toBe(true);
    vi.advanceTimersByTime(3_000);
    expect(seen).toHaveLength(3);

    monitor.stop();
    expect(monitor.isRunning()).toBe(false);
    expect(monitor.touch.isActive()).toBe(false);
    vi.advanceTimersByTime(3_000);
    expect(seen).toHaveLength(3);
  });

  it('reports a failing scheduled evaluation and keeps running', () => {
    vi.useFakeTimers();
    const logger = createSpyLogger();
    logger.logFusionResult.mockImplementation(() => {
      throw new Error('disk full');
    });
    const monitor = createRiskMonitor({ now: () => 0, logger, scheduling: 'interval', intervalMs: 1_000 });

    monitor.start();
    vi.advanceTimersByTime(2_000);
    monitor.stop();

    const failures = logger.log.mock.calls.filter(([level]) => level === 'ERROR');
    expect(failures).toEqual([
      ['ERROR', 'EVALUATION', 'scheduled evaluation failed: disk full'],
      ['ERROR', 'EVALUATION', 'scheduled evaluation failed: disk full'],
    ]);
  });

  it('falls back to console.error when the logger itself fails', () => {
    vi.useFakeTimers();
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createResultLogger({
      now: () => 0,
      write: (line) => {
        if (!line.includes('LIFECYCLE')) throw new Error('disk full');
      },
    });
    const monitor = createRiskMonitor({ now: () => 0, logger, scheduling: 'interval', intervalMs: 1_000 });

    monitor.start();
    vi.advanceTimersByTime(1_000);
    monitor.stop();

    expect(errors).toHaveBeenCalledTimes(1);
    expect(errors).toHaveBeenCalledWith('scheduled evaluation failed: disk full (logger failed: disk full)');
    errors.mockRestore();
  });

  it('does not schedule in manual mode', () => {
    vi.useFakeTimers();
    const onEvaluation = vi.fn();
    const monitor = createRiskMonitor({ intervalMs: 1_000, onEvaluation });
    monitor.start();
    vi.advanceTimersByTime(10_000);
    expect(onEvaluation).not.toHaveBeenCalled();
    monitor.stop();
  });
});

describe('persistence', () => {
  it('is a no-op without a store', async () => {
    const monitor = createRiskMonitor();
    await expect(monitor.saveState()).resolves.toBeUndefined();
    await expect(monitor.loadState()).resolves.toEqual([]);
  });

  it('restores every agent from saved snapshots', async () => {
    const store = createMemoryStateStore();
    const source = createRiskMonitor({ store });
    source.usage.applyState(learnedUsage);
    await source.saveState();

    const target = createRiskMonitor({ store });
    await expect(target.loadState()).resolves.toEqual(['touch', 'typing', 'usage']);
    expect(target.usage.getState()).toEqual(learnedUsage);
    expect(target.typing.getState()).toEqual(source.typing.getState());
  });

  it('discards invalid snapshots and keeps the valid ones', async () => {
    const touchText = encodeState('touch', createTouchAgent().getState());
    const store = createMemoryStateStore({ touch: touchText, usage: touchText });
    const logger = createSpyLogger();
    const monitor = createRiskMonitor({ store, logger });

    await expect(monitor.loadState()).resolves.toEqual(['touch']);
    expect(logger.log).toHaveBeenCalledWith(
      'WARN',
      'STATE',
      'discarded usage snapshot: expected usage state, got touch',
    );
    expect(monitor.usage.getState().totalSessions).toBe(0);
  });
});

describe('scoreGesture', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns null without an external scorer', async () => {
    await expect(createRiskMonitor().scoreGesture({ avg_velocity: 1 })).resolves.toBeNull();
  });

  it('forwards features to the external scorer', async () => {
    const result: ExternalScoreResult = { ok: true, score: 0.9, mse: 0.02, threshold: 0.05, error: null };
    const score = vi.fn(async (_features: Record<string, number>) => result);
    const monitor = createRiskMonitor({ externalScorer: { score } });

    await expect(monitor.scoreGesture({ avg_velocity: 1 })).resolves.toEqual(result);
    expect(score).toHaveBeenCalledWith({ avg_velocity: 1 });
  });

  it('applies the default two-second timeout', async () => {
    vi.useFakeTimers();
    const monitor = createRiskMonitor({
      externalScorer: { score: () => new Promise<ExternalScoreResult>(() => {}) },
    });
    const pending = monitor.scoreGesture({});
    await vi.advanceTimersByTimeAsync(2_000);
    await expect(pending).resolves.toEqual(failedScore('timeout after 2000ms'));
  });
});
