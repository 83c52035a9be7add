/** Learned "normal" profile of one feature: EWMA mean and variance. */
export interface Baseline {
  mean: number;
  variance: number;
}

export interface AgentResult {
  /** Anomaly score, 0.0 (normal) to 1.0 (highly anomalous) */
  readonly score: number;
  /** Human-readable reasons, in detection order */
  readonly explanations: readonly string[];
  /** Epoch milliseconds */
  readonly timestamp: number;
}

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export interface FusionResult {
  /** Weighted fused score. Not bounded to [0, 1]: inputs are scaled by 10 before weighting. */
  readonly finalScore: number;
  readonly riskLevel: RiskLevel;
  readonly explanations: readonly string[];
  readonly timestamp: number;
}

export interface FusionWeights {
  touch: number;
  typing: number;
  usage: number;
}

export type AgentKind = keyof FusionWeights;

/** Per-agent scores handed to fusion; null means the signal is absent. */
export type ComponentScores = Record<AgentKind, number | null>;

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface ResultLogger {
  log(level: LogLevel, category: string, message: string): void;
  logAgentResult(agentName: string, result: AgentResult): void;
  logFusionResult(result: FusionResult, scores: ComponentScores): void;
  logResponseAction(level: RiskLevel, action: string, details: string): void;
}

/** Lifecycle and persistence contract shared by the three stream scorers. */
export interface Agent<TState> {
  readonly name: string;
  /** Begin accepting events */
  start(): void;
  /** Stop accepting events and drop the recent windows (baselines are kept) */
  stop(): void;
  isActive(): boolean;
  /** Current score snapshot. Reading never mutates scorer state. */
  getResult(): AgentResult;
  /** Forget the learned baseline and re-enter warmup */
  resetBaseline(): void;
  /** Baseline moments and warmup bookkeeping, for persistence */
  getState(): TState;
  /** Restore a snapshot from getState(). Null or undefined is ignored. */
  applyState(state: TState | null | undefined): void;
}

export interface AgentConfig {
  /** Clock used to timestamp events and results. Default: Date.now */
  now?: () => number;
  /** EWMA smoothing factor for every baseline. Default: 0.1 */
  alpha?: number;
  /** Receives lifecycle messages (start, stop, warmup complete, reset) */
  logger?: ResultLogger;
}

// ── Touch ──

export type TouchPhase = 'DOWN' | 'MOVE' | 'UP';

export interface TouchPoint {
  x: number;
  y: number;
  pressure: number;
  size: number;
}

/** Tagged input for the single-entry `add()` dispatch. */
export interface TouchInput extends TouchPoint {
  kind: TouchPhase;
  pointerId: number;
}

/** One raw pointer sample. Transient: never retained past its gesture. */
export interface TouchSample extends TouchInput {
  timestamp: number;
}

/** MULTI_TOUCH is reserved and never produced by the classifier. */
export type GestureType = 'TAP' | 'SWIPE' | 'MULTI_TOUCH';

/** Scalar features of one completed gesture. Contains no coordinates. */
export interface GestureFeatures {
  /** End of the gesture, epoch ms */
  timestamp: number;
  gestureType: GestureType;
  durationMs: number;
  totalDistance: number;
  /** px per ms */
  avgVelocity: number;
  /** px per ms, fastest single segment */
  peakVelocity: number;
  avgPressure: number;
  peakPressure: number;
  /** Mean perpendicular distance of interior points from the start→end chord */
  pathDeviation: number;
  directionChanges: number;
  /** Standard deviation of the perpendicular distances */
  jitter: number;
}

export interface TouchBaselines {
  avgVelocity: Baseline;
  peakVelocity: Baseline;
  pathDeviation: Baseline;
  tapDuration: Baseline;
  jitter: Baseline;
  pressure: Baseline;
}

export interface TouchState {
  baselines: TouchBaselines;
  totalGestures: number;
  inWarmup: boolean;
}

export interface TouchAgentConfig extends AgentConfig {
  /** Completed gestures kept for recent statistics. Default: 50 */
  windowSize?: number;
  /** Gestures observed before baselines start learning. Default: 5 */
  warmupThreshold?: number;
}

export type GestureListener = (features: GestureFeatures) => void;

export interface TouchAgent extends Agent<TouchState> {
  onTouchDown(pointerId: number, x: number, y: number, pressure: number, size: number): void;
  onTouchMove(pointerId: number, x: number, y: number, pressure: number, size: number): void;
  onTouchUp(pointerId: number, x: number, y: number, pressure: number, size: number): void;
  add(input: TouchInput): void;
  /** Subscribe to per-gesture feature vectors. Returns an unsubscribe function. */
  onGesture(listener: GestureListener): () => void;
}

// ── Keystroke ──

export interface TypingBaselines {
  dwell: Baseline;
  flight: Baseline;
  backspaceRate: Baseline;
}

export interface TypingState {
  baselines: TypingBaselines;
  totalKeystrokes: number;
  inWarmup: boolean;
}

export interface TypingAgentConfig extends AgentConfig {
  /** Dwell and flight samples kept for recent statistics. Default: 50 */
  windowSize?: number;
  /** Key presses observed before baselines start learning. Default: 100 */
  warmupThreshold?: number;
}

export interface TypingAgent extends Agent<TypingState> {
  /** Key code only; key text is never seen. `pressure` may be 0 when unavailable. */
  onKeyEvent(isKeyDown: boolean, keyCode: number, pressure: number): void;
}

// ── App usage ──

export type UsageInput =
  | { kind: 'APP_OPENED'; appId: string | null | undefined }
  | { kind: 'APP_CLOSED'; appId: string | null | undefined }
  | { kind: 'APP_SWITCH'; from: string | null | undefined; to: string | null | undefined }
  | { kind: 'SCREEN_ON' }
  | { kind: 'SCREEN_OFF' }
  | { kind: 'UNLOCK' };

export interface UsageBaselines {
  /** Launches per minute */
  launchRate: Baseline;
  /** Switches per minute */
  switchRate: Baseline;
  /** Session length, ms */
  sessionDuration: Baseline;
}

export interface UsageState {
  baselines: UsageBaselines;
  totalSessions: number;
  inWarmup: boolean;
}

export interface UsageAgentConfig extends AgentConfig {
  /** Closed sessions observed before baselines start learning. Default: 20 */
  warmupThreshold?: number;
  /** Recent session durations kept. Default: 100 */
  sessionWindowSize?: number;
  /** Horizon for launch/switch rates, ms. Default: 120000 */
  rateWindowMs?: number;
  /** Replace app identifiers with a truncated SHA-256 digest before tracking. Default: false */
  hashAppIds?: boolean;
}

export interface UsageAgent extends Agent<UsageState> {
  onAppOpened(appId: string | null | undefined): void;
  onAppClosed(appId: string | null | undefined): void;
  onAppSwitch(from: string | null | undefined, to: string | null | undefined): void;
  onScreenOn(): void;
  onScreenOff(): void;
  onUnlock(): void;
  add(input: UsageInput): void;
}
