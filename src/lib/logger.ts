/**
 * Indexer Logger
 *
 * Structured JSON logging for the indexer process and its read API.
 */

import 'dotenv/config';
import pino from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

/**
 * Level named by LOG_LEVEL, or `info` when unset or unknown. Unknown values
 * are reported by the configuration check at startup.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  return value !== undefined && isLogLevel(value) ? value : 'info';
}

export const logger = pino({
  name: 'trove-position-indexer',
  level: resolveLogLevel(process.env.LOG_LEVEL),
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Create a child logger with a specific component name
 */
export function createLogger(component: string): pino.Logger {
  return logger.child({ component });
}

/**
 * Convert unknown error to a loggable message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Structured log helpers for common indexer events
 */
export const indexerLog = {
  batchProcessed: (
    log: pino.Logger,
    fromBlock: bigint,
    toBlock: bigint,
    logCount: number,
    folded: number,
    durationMs: number
  ) => {
    log.info({
      fromBlock: fromBlock.toString(),
      toBlock: toBlock.toString(),
      logCount,
      folded,
      durationMs,
      msg: `Processed batch ${fromBlock}-${toBlock} (${logCount} logs)`,
    });
  },

  eventSkipped: (
    log: pino.Logger,
    transactionHash: string,
    logIndex: number,
    reason: string
  ) => {
    log.warn({ transactionHash, logIndex, reason, msg: 'Event skipped' });
  },

  foldRejected: (
    log: pino.Logger,
    code: string,
    transactionHash: string,
    context: Record<string, unknown>,
    error: string
  ) => {
    log.warn({ code, transactionHash, ...context, error, msg: 'Position update rejected' });
  },

  stateChanged: (log: pino.Logger, from: string, to: string, cursor: bigint) => {
    log.info({ from, to, cursor: cursor.toString(), msg: `Scheduler ${from} -> ${to}` });
  },
};
