import { z } from 'zod';

const PositiveIntZ = z.number().int().positive();
const WeightZ = z.number().finite().nonnegative();

const WeightsZ = z
  .object({
    touch: WeightZ,
    typing: WeightZ,
    usage: WeightZ,
  })
  .partial()
  .strict();

const TouchConfigZ = z
  .object({
    windowSize: PositiveIntZ,
    warmupThreshold: PositiveIntZ,
  })
  .partial()
  .strict();

const TypingConfigZ = TouchConfigZ;

const UsageConfigZ = z
  .object({
    warmupThreshold: PositiveIntZ,
    sessionWindowSize: PositiveIntZ,
    rateWindowMs: PositiveIntZ,
    hashAppIds: z.boolean(),
  })
  .partial()
  .strict();

const AlertsConfigZ = z
  .object({
    minScoreDelta: z.number().finite().nonnegative(),
    minIntervalMs: z.number().int().nonnegative(),
    escalationStreak: PositiveIntZ,
    escalationIntervalMs: z.number().int().nonnegative(),
  })
  .partial()
  .strict();

/** JSON-loadable monitor settings. Unknown keys are rejected. */
export const MonitorConfigZ = z
  .object({
    alpha: z.number().gt(0).lte(1),
    weights: WeightsZ,
    touch: TouchConfigZ,
    typing: TypingConfigZ,
    usage: UsageConfigZ,
    scheduling: z.enum(['manual', 'interval']),
    intervalMs: PositiveIntZ,
    alerts: AlertsConfigZ,
    externalTimeoutMs: z.number().int().nonnegative(),
  })
  .partial()
  .strict();

export type MonitorConfig = z.infer<typeof MonitorConfigZ>;

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid monitor config: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** `path: message` per issue; the document root is shown as `(root)`. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/** Validate an untrusted configuration document. Throws ConfigError. */
export function parseMonitorConfig(input: unknown): MonitorConfig {
  const parsed = MonitorConfigZ.safeParse(input);
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error));
  return parsed.data;
}
