import { z } from 'zod';
import type { AgentKind, TouchState, TypingState, UsageState } from './types';
import { formatIssues } from './config';

/** Bumped whenever a persisted field changes meaning. */
export const STATE_VERSION = 1;

const BaselineZ = z
  .object({
    mean: z.number().finite(),
    variance: z.number().finite().nonnegative(),
  })
  .strict();

const CountZ = z.number().int().nonnegative();

const TouchStateZ = z
  .object({
    baselines: z
      .object({
        avgVelocity: BaselineZ,
        peakVelocity: BaselineZ,
        pathDeviation: BaselineZ,
        tapDuration: BaselineZ,
        jitter: BaselineZ,
        pressure: BaselineZ,
      })
      .strict(),
    totalGestures: CountZ,
    inWarmup: z.boolean(),
  })
  .strict();

const TypingStateZ = z
  .object({
    baselines: z
      .object({
        dwell: BaselineZ,
        flight: BaselineZ,
        backspaceRate: BaselineZ,
      })
      .strict(),
    totalKeystrokes: CountZ,
    inWarmup: z.boolean(),
  })
  .strict();

const UsageStateZ = z
  .object({
    baselines: z
      .object({
        launchRate: BaselineZ,
        switchRate: BaselineZ,
        sessionDuration: BaselineZ,
      })
      .strict(),
    totalSessions: CountZ,
    inWarmup: z.boolean(),
  })
  .strict();

export interface AgentStates {
  touch: TouchState;
  typing: TypingState;
  usage: UsageState;
}

const STATE_SCHEMAS: { [K in AgentKind]: z.ZodType<AgentStates[K]> } = {
  touch: TouchStateZ,
  typing: TypingStateZ,
  usage: UsageStateZ,
};

const EnvelopeZ = z.object({
  version: z.literal(STATE_VERSION),
  kind: z.enum(['touch', 'typing', 'usage']),
  state: z.unknown(),
});

export type DecodeResult<T> = { ok: true; state: T } | { ok: false; error: string };

export function encodeState<K extends AgentKind>(kind: K, state: AgentStates[K]): string {
  return JSON.stringify({ version: STATE_VERSION, kind, state });
}

/** Parse and validate a snapshot written by encodeState. Never throws. */
export function decodeState<K extends AgentKind>(kind: K, text: string): DecodeResult<AgentStates[K]> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { ok: false, error: `malformed JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const envelope = EnvelopeZ.safeParse(raw);
  if (!envelope.success) return { ok: false, error: formatIssues(envelope.error).join('; ') };
  if (envelope.data.kind !== kind) {
    return { ok: false, error: `expected ${kind} state, got ${envelope.data.kind}` };
  }

  const state = STATE_SCHEMAS[kind].safeParse(envelope.data.state);
  if (!state.success) {
    return { ok: false, error: formatIssues(state.error).map((i) => `state.${i}`).join('; ') };
  }
  return { ok: true, state: state.data };
}

/** Keyed storage for encoded snapshots. */
export interface StateStore {
  load(kind: AgentKind): Promise<string | null>;
  save(kind: AgentKind, text: string): Promise<void>;
}

export function createMemoryStateStore(initial?: Partial<Record<AgentKind, string>>): StateStore {
  const entries = new Map<AgentKind, string>();
  for (const kind of ['touch', 'typing', 'usage'] as const) {
    const text = initial?.[kind];
    if (text !== undefined) entries.set(kind, text);
  }

  return {
    async load(kind: AgentKind) {
      return entries.get(kind) ?? null;
    },
    async save(kind: AgentKind, text: string) {
      entries.set(kind, text);
    },
  };
}
