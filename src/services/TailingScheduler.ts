import { setTimeout as delay } from "timers/promises";
import type { SchedulerConfig } from "../config/env";
import { isRetryable } from "../lib/errors";
import { createLogger, errorMessage, indexerLog } from "../lib/logger";
import type { RawLog } from "../types/events";
import type { BatchResult } from "./BatchProcessor";
import type { CursorStore } from "./CursorStore";

const log = createLogger("TailingScheduler");

export type SchedulerState = "catching_up" | "idle";

export type StepResult =
  | { kind: "batch"; fromBlock: bigint; toBlock: bigint; result: BatchResult }
  | { kind: "retry"; fromBlock: bigint; error: string }
  | { kind: "idle"; head: bigint };

export interface SchedulerStatus {
  state: SchedulerState;
  /** Next block to process */
  cursor: string;
  head: string | null;
  running: boolean;
}

/**
 * What the scheduler needs from the log fetcher
 */
export interface BlockSource {
  currentHead(): Promise<bigint>;
  fetchRange(fromBlock: bigint, toBlock: bigint): Promise<RawLog[]>;
}

/**
 * What the scheduler needs from the batch processor
 */
export interface BatchHandler {
  process(logs: readonly RawLog[]): Promise<BatchResult>;
}

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

const defaultSleep: Sleep = (ms, signal) => delay(ms, undefined, { signal });

/**
 * Control loop that tails the ledger in fixed-size batches.
 *
 * While the cursor is at or below the known head it is `catching_up`: each step
 * fetches and processes one batch and, on success, persists the new cursor.
 * Transient fetch and persistence failures leave the cursor where it was and
 * the same range is retried after `retryIntervalMs`, without limit. Once past
 * the head it is `idle` and re-reads the head every `pollIntervalMs`.
 */
export class TailingScheduler {
  private state: SchedulerState = "catching_up";
  private cursor: bigint;
  private head: bigint | null = null;
  private initialized = false;
  private abort: AbortController | null = null;
  private readonly sleep: Sleep;

  constructor(
    private readonly source: BlockSource,
    private readonly handler: BatchHandler,
    private readonly cursorStore: CursorStore,
    private readonly config: SchedulerConfig,
    sleep: Sleep = defaultSleep
  ) {
    this.cursor = config.startBlock;
    this.sleep = sleep;
  }

  /**
   * Resume after the persisted checkpoint, never before the configured start
   */
  async init(): Promise<void> {
    const saved = await this.cursorStore.load();
    if (saved !== null && saved + 1n > this.config.startBlock) {
      this.cursor = saved + 1n;
    }
    this.initialized = true;
    log.info(
      { cursor: this.cursor.toString(), checkpoint: saved?.toString() ?? null },
      "Scheduler initialized"
    );
  }

  getStatus(): SchedulerStatus {
    return {
      state: this.state,
      cursor: this.cursor.toString(),
      head: this.head?.toString() ?? null,
      running: this.abort !== null,
    };
  }

  /**
   * Perform one transition of the state machine
   */
  async step(): Promise<StepResult> {
    let head = this.head;
    if (head === null || this.cursor > head) {
      try {
        head = await this.source.currentHead();
      } catch (error) {
        if (!isRetryable(error)) throw error;
        log.warn({ error: errorMessage(error) }, "Failed to read chain head");
        return { kind: "retry", fromBlock: this.cursor, error: errorMessage(error) };
      }
      this.head = head;

      if (this.cursor > head) {
        this.transition("idle");
        return { kind: "idle", head };
      }
    }

    this.transition("catching_up");

    const fromBlock = this.cursor;
    const end = fromBlock + BigInt(this.config.batchSize) - 1n;
    const toBlock = end < head ? end : head;
    const startedAt = Date.now();

    try {
      const logs = await this.source.fetchRange(fromBlock, toBlock);
      const result = await this.handler.process(logs);
      await this.cursorStore.save(toBlock);
      this.cursor = toBlock + 1n;
      indexerLog.batchProcessed(log, fromBlock, toBlock, result.logCount, result.folded, Date.now() - startedAt);
      return { kind: "batch", fromBlock, toBlock, result };
    } catch (error) {
      if (!isRetryable(error)) throw error;
      log.warn(
        { fromBlock: fromBlock.toString(), toBlock: toBlock.toString(), error: errorMessage(error) },
        "Batch failed, will retry"
      );
      return { kind: "retry", fromBlock, error: errorMessage(error) };
    }
  }

  /**
   * Loop until stopped. Rejects on errors that must halt ingestion.
   */
  async run(): Promise<void> {
    if (this.abort) {
      log.warn("Scheduler already running");
      return;
    }
    if (!this.initialized) {
      await this.init();
    }

    const abort = new AbortController();
    this.abort = abort;
    log.info({ cursor: this.cursor.toString() }, "Scheduler started");

    try {
      while (!abort.signal.aborted) {
        const outcome = await this.step();
        if (outcome.kind === "batch") continue;

        const wait = outcome.kind === "retry" ? this.config.retryIntervalMs : this.config.pollIntervalMs;
        try {
          await this.sleep(wait, abort.signal);
        } catch (error) {
          if (!abort.signal.aborted) throw error;
        }
      }
    } finally {
      this.abort = null;
      log.info({ cursor: this.cursor.toString() }, "Scheduler stopped");
    }
  }

  /**
   * Stop after the current step; a pending wait is cut short
   */
  stop(): void {
    this.abort?.abort();
  }

  private transition(next: SchedulerState): void {
    if (this.state === next) return;
    indexerLog.stateChanged(log, this.state, next, this.cursor);
    this.state = next;
  }
}
