import fs from 'node:fs';
import path from 'node:path';
import type { AgentResult, ComponentScores, FusionResult, LogLevel, ResultLogger, RiskLevel } from './types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export type LineWriter = (line: string) => void;

export interface ResultLoggerConfig {
  /** Receives each formatted line. Default: console.log */
  write?: LineWriter;
  /** Entries below this level are dropped. Default: INFO */
  minLevel?: LogLevel;
  /** Clock for the line prefix. Default: Date.now */
  now?: () => number;
}

function formatScore(score: number | null): string {
  return score === null ? 'N/A' : score.toFixed(3);
}

/**
 * Line-oriented sink for agent, fusion and response-action records:
 * `<ISO timestamp> [LEVEL] CATEGORY: message`.
 */
export function createResultLogger(config?: ResultLoggerConfig): ResultLogger {
  const write = config?.write ?? ((line: string) => console.log(line));
  const minLevel = config?.minLevel ?? 'INFO';
  const now = config?.now ?? (() => Date.now());

  function log(level: LogLevel, category: string, message: string) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    const timestamp = new Date(now()).toISOString();
    write(`${timestamp} [${level}] ${category}: ${message}`);
  }

  return {
    log,

    logAgentResult(agentName: string, result: AgentResult) {
      log(
        'INFO',
        'AGENT_RESULT',
        `Agent=${agentName}, Score=${result.score.toFixed(3)}, ` +
          `Explanations=${result.explanations.join('; ')}, Timestamp=${result.timestamp}`,
      );
    },

    logFusionResult(result: FusionResult, scores: ComponentScores) {
      log(
        'INFO',
        'FUSION_RESULT',
        `FinalScore=${result.finalScore.toFixed(3)}, RiskLevel=${result.riskLevel}, ` +
          `TouchScore=${formatScore(scores.touch)}, TypingScore=${formatScore(scores.typing)}, ` +
          `UsageScore=${formatScore(scores.usage)}, Explanations=${result.explanations.join('; ')}`,
      );
    },

    logResponseAction(level: RiskLevel, action: string, details: string) {
      log('INFO', 'RESPONSE_ACTION', `RiskLevel=${level}, Action=${action}, Details=${details}`);
    },
  };
}

export interface FileWriter {
  write: LineWriter;
  /** Flush and close the underlying stream. */
  close(): Promise<void>;
}

/**
 * Append-only line writer for `createResultLogger`. Creates the parent directory.
 * Stream errors never escape: once the file fails, further writes are dropped and
 * `close()` rejects with the first error.
 */
export async function createFileWriter(logPath: string): Promise<FileWriter> {
  await fs.promises.mkdir(path.dirname(logPath), { recursive: true });
  const stream = fs.createWriteStream(logPath, { flags: 'a' });
  let failure: Error | undefined;
  stream.on('error', (err) => {
    if (!failure) failure = err;
  });

  return {
    write(line: string) {
      if (failure || stream.destroyed) return;
      stream.write(`${line}\n`);
    },
    close() {
      return new Promise<void>((resolve, reject) => {
        const settle = (err?: Error | null) => {
          if (err && !failure) failure = err;
          if (failure) reject(failure);
          else resolve();
        };
        if (failure || stream.destroyed) {
          settle(stream.errored);
          return;
        }
        stream.once('error', settle);
        stream.end(settle);
      });
    },
  };
}
