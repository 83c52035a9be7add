import type {
  AgentKind,
  AgentResult,
  ComponentScores,
  FusionResult,
  ResultLogger,
  TouchAgent,
  TypingAgent,
  UsageAgent,
} from './types';
import type { MonitorConfig } from './config';
import { createTouchAgent } from './touch';
import { createTypingAgent } from './keystroke';
import { createUsageAgent } from './usage';
import { createFusionEngine, responseAction, type FusionEngine } from './fusion';
import { createAlertPolicy } from './alerts';
import { decodeState, encodeState, type StateStore } from './state';
import { scoreWithTimeout, type ExternalScoreResult, type ExternalScorer } from './external';

const DEFAULT_INTERVAL_MS = 5_000;
const DEFAULT_EXTERNAL_TIMEOUT_MS = 2_000;

export interface Evaluation {
  fusion: FusionResult;
  results: Record<AgentKind, AgentResult>;
  /** Scores handed to fusion; null for agents that were not active */
  scores: ComponentScores;
  /** Recommended response for the fused risk level */
  action: string;
  alert: boolean;
  escalate: boolean;
}

export interface RiskMonitorConfig extends MonitorConfig {
  logger?: ResultLogger;
  /** Clock shared by every agent and the fusion engine. Default: Date.now */
  now?: () => number;
  /** Persistence target for saveState/loadState */
  store?: StateStore;
  externalScorer?: ExternalScorer;
  onEvaluation?: (evaluation: Evaluation) => void;
}

export interface RiskMonitor {
  readonly touch: TouchAgent;
  readonly typing: TypingAgent;
  readonly usage: UsageAgent;
  readonly fusion: FusionEngine;
  start(): void;
  stop(): void;
  isRunning(): boolean;
  /** Snapshot every agent, fuse, log and apply the alert policy. */
  evaluate(): Evaluation;
  /** Score one gesture with the external model. Null when none is configured. Never fused. */
  scoreGesture(features: Record<string, number>): Promise<ExternalScoreResult | null>;
  saveState(): Promise<void>;
  /** Restore every agent with a valid stored snapshot. Returns the kinds restored. */
  loadState(): Promise<AgentKind[]>;
}

/**
 * Owns one scorer per stream plus fusion and alerting. Events go straight to
 * the exposed agents; evaluation runs on demand or on a fixed interval.
 */
export function createRiskMonitor(config?: RiskMonitorConfig): RiskMonitor {
  const logger = config?.logger;
  const now = config?.now ?? (() => Date.now());
  const alpha = config?.alpha;
  const scheduling = config?.scheduling ?? 'manual';
  const intervalMs = config?.intervalMs ?? DEFAULT_INTERVAL_MS;
  const externalTimeoutMs = config?.externalTimeoutMs ?? DEFAULT_EXTERNAL_TIMEOUT_MS;
  const onEvaluation = config?.onEvaluation;

  const touch = createTouchAgent({ ...config?.touch, alpha, now, logger });
  const typing = createTypingAgent({ ...config?.typing, alpha, now, logger });
  const usage = createUsageAgent({ ...config?.usage, alpha, now, logger });
  const agents = { touch, typing, usage };

  const fusion = createFusionEngine({ weights: config?.weights, now });
  const alerts = createAlertPolicy(config?.alerts);

  let running = false;
  let intervalHandle: ReturnType<typeof setInterval> | undefined;

  function scoreOf(kind: AgentKind, result: AgentResult): number | null {
    return agents[kind].isActive() ? result.score : null;
  }

  function evaluate(): Evaluation {
    const results: Record<AgentKind, AgentResult> = {
      touch: touch.getResult(),
      typing: typing.getResult(),
      usage: usage.getResult(),
    };
    const scores: ComponentScores = {
      touch: scoreOf('touch', results.touch),
      typing: scoreOf('typing', results.typing),
      usage: scoreOf('usage', results.usage),
    };
    const fused = fusion.fuseScores(scores.touch, scores.typing, scores.usage);
    const action = responseAction(fused.riskLevel);
    const { alert, escalate } = alerts.evaluate(fused);

    if (logger) {
      for (const kind of ['touch', 'typing', 'usage'] as const) {
        if (scores[kind] !== null) logger.logAgentResult(agents[kind].name, results[kind]);
      }
      logger.logFusionResult(fused, scores);
      if (alert) {
        logger.logResponseAction(fused.riskLevel, action, `score=${fused.finalScore.toFixed(2)}`);
      }
      if (escalate) {
        logger.log('WARN', 'ESCALATION', `sustained HIGH risk, score=${fused.finalScore.toFixed(3)}`);
      }
    }

    const evaluation: Evaluation = { fusion: fused, results, scores, action, alert, escalate };
    if (onEvaluation) {
      try {
        onEvaluation(evaluation);
      } catch (err) {
        logger?.log('WARN', 'EVALUATION_LISTENER', `listener failed: ${messageOf(err)}`);
      }
    }
    return evaluation;
  }

  function messageOf(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
  }

  /** Timer entry point: a failing evaluation is reported, never thrown out of the timer. */
  function runScheduled() {
    try {
      evaluate();
    } catch (err) {
      const message = `scheduled evaluation failed: ${messageOf(err)}`;
      try {
        logger?.log('ERROR', 'EVALUATION', message);
      } catch (logErr) {
        console.error(`${message} (logger failed: ${messageOf(logErr)})`);
      }
    }
  }

  function start() {
    if (running) return;
    running = true;
    touch.start();
    typing.start();
    usage.start();
    if (scheduling === 'interval') {
      intervalHandle = setInterval(runScheduled, intervalMs);
    }
  }

  function stop() {
    if (intervalHandle !== undefined) {
      clearInterval(intervalHandle);
      intervalHandle = undefined;
    }
    if (!running) return;
    running = false;
    touch.stop();
    typing.stop();
    usage.stop();
  }

  async function scoreGesture(features: Record<string, number>): Promise<ExternalScoreResult | null> {
    const scorer = config?.externalScorer;
    if (!scorer) return null;
    return scoreWithTimeout(scorer, features, externalTimeoutMs);
  }

  async function saveState() {
    const store = config?.store;
    if (!store) return;
    await store.save('touch', encodeState('touch', touch.getState()));
    await store.save('typing', encodeState('typing', typing.getState()));
    await store.save('usage', encodeState('usage', usage.getState()));
  }

  async function loadState(): Promise<AgentKind[]> {
    const store = config?.store;
    if (!store) return [];
    const restored: AgentKind[] = [];

    const touchText = await store.load('touch');
    if (touchText !== null) {
      const decoded = decodeState('touch', touchText);
      if (decoded.ok) {
        touch.applyState(decoded.state);
        restored.push('touch');
      } else {
        logger?.log('WARN', 'STATE', `discarded touch snapshot: ${decoded.error}`);
      }
    }

    const typingText = await store.load('typing');
    if (typingText !== null) {
      const decoded = decodeState('typing', typingText);
      if (decoded.ok) {
        typing.applyState(decoded.state);
        restored.push('typing');
      } else {
        logger?.log('WARN', 'STATE', `discarded typing snapshot: ${decoded.error}`);
      }
    }

    const usageText = await store.load('usage');
    if (usageText !== null) {
      const decoded = decodeState('usage', usageText);
      if (decoded.ok) {
        usage.applyState(decoded.state);
        restored.push('usage');
      } else {
        logger?.log('WARN', 'STATE', `discarded usage snapshot: ${decoded.error}`);
      }
    }

    return restored;
  }

  return {
    touch,
    typing,
    usage,
    fusion,
    start,
    stop,
    isRunning: () => running,
    evaluate,
    scoreGesture,
    saveState,
    loadState,
  };
}
