export type {
  Agent,
  AgentConfig,
  AgentKind,
  AgentResult,
  Baseline,
  ComponentScores,
  FusionResult,
  FusionWeights,
  GestureFeatures,
  GestureListener,
  GestureType,
  LogLevel,
  ResultLogger,
  RiskLevel,
  TouchAgent,
  TouchAgentConfig,
  TouchBaselines,
  TouchInput,
  TouchPhase,
  TouchPoint,
  TouchSample,
  TouchState,
  TypingAgent,
  TypingAgentConfig,
  TypingBaselines,
  TypingState,
  UsageAgent,
  UsageAgentConfig,
  UsageBaselines,
  UsageInput,
  UsageState,
} from './types';

export { createWindow, type BoundedWindow } from './buffer';
export { createEwma, EWMA_ALPHA, type EwmaStat } from './ewma';
export {
  INSUFFICIENT_DATA,
  MODERATE_THRESHOLD,
  NOT_ACTIVE,
  SIGNIFICANT_THRESHOLD,
  severityOf,
} from './agent';
export {
  classifyGesture,
  createGestureSegmenter,
  extractFeatures,
  GESTURE_CSV_HEADER,
  TAP_DURATION_THRESHOLD_MS,
  TAP_MOVEMENT_THRESHOLD,
  toCsvRow,
  type GestureSegmenter,
} from './gesture';
export { createTouchAgent, detectBotPatterns, TOUCH_AGENT_NAME, TOUCH_WEIGHTS } from './touch';
export {
  BACKSPACE_KEY_CODE,
  createTypingAgent,
  DELETE_KEY_CODE,
  TYPING_AGENT_NAME,
  TYPING_WEIGHTS,
} from './keystroke';
export { createUsageAgent, hashAppId, USAGE_AGENT_NAME, USAGE_WEIGHTS } from './usage';
export {
  createFusionEngine,
  DEFAULT_FUSION_WEIGHTS,
  determineRiskLevel,
  FUSION_SCALE,
  fusionToJson,
  HIGH_THRESHOLD,
  LOW_THRESHOLD,
  NO_SIGNALS,
  responseAction,
  type FusionEngine,
  type FusionEngineConfig,
} from './fusion';
export {
  createFileWriter,
  createResultLogger,
  type FileWriter,
  type LineWriter,
  type ResultLoggerConfig,
} from './log';
export { ConfigError, MonitorConfigZ, parseMonitorConfig, type MonitorConfig } from './config';
export {
  createMemoryStateStore,
  decodeState,
  encodeState,
  STATE_VERSION,
  type AgentStates,
  type DecodeResult,
  type StateStore,
} from './state';
export {
  failedScore,
  gestureFeatureMap,
  scoreWithTimeout,
  type ExternalScorer,
  type ExternalScoreResult,
} from './external';
export {
  createAlertPolicy,
  type AlertDecision,
  type AlertPolicy,
  type AlertPolicyConfig,
} from './alerts';
export {
  createRiskMonitor,
  type Evaluation,
  type RiskMonitor,
  type RiskMonitorConfig,
} from './monitor';
