import { isFoldRejection } from "../lib/errors";
import { createLogger, indexerLog } from "../lib/logger";
import type { RawLog } from "../types/events";
import type { EventDecoder } from "./EventDecoder";
import type { PositionFolder } from "./PositionFolder";
import { toLedgerEventRecord, type PositionGateway } from "./PositionGateway";

const log = createLogger("BatchProcessor");

export interface BatchResult {
  logCount: number;
  decoded: number;
  unresolved: number;
  skipped: number;
  folded: number;
  replayed: number;
  rejected: number;
}

/**
 * Decodes, records and folds the logs of one block range in order.
 *
 * Unresolved and undecodable logs are skipped, and rejected position updates
 * are logged; the batch carries on in each case. Persistence failures and
 * identity collisions propagate to the scheduler.
 */
export class BatchProcessor {
  constructor(
    private readonly decoder: EventDecoder,
    private readonly folder: PositionFolder,
    private readonly gateway: PositionGateway,
    private readonly now: () => Date = () => new Date()
  ) {}

  async process(logs: readonly RawLog[]): Promise<BatchResult> {
    const result: BatchResult = {
      logCount: logs.length,
      decoded: 0,
      unresolved: 0,
      skipped: 0,
      folded: 0,
      replayed: 0,
      rejected: 0,
    };

    for (const rawLog of logs) {
      const decoded = this.decoder.decode(rawLog);

      if (decoded.status === "unresolved") {
        result.unresolved++;
        log.debug(
          { address: rawLog.address, selector: decoded.selector, transactionHash: rawLog.transactionHash },
          "Unresolved log"
        );
        continue;
      }

      if (decoded.status === "skipped") {
        result.skipped++;
        indexerLog.eventSkipped(log, rawLog.transactionHash, rawLog.logIndex, decoded.error.message);
        continue;
      }

      const event = decoded.event;
      result.decoded++;
      log.info(
        { event: event.name, contract: event.contract, transactionHash: event.transactionHash },
        `Event: ${event.name}`
      );

      await this.gateway.recordEvent(toLedgerEventRecord(event, this.now()));

      if (event.name !== "TroveUpdated") continue;

      try {
        const outcome = await this.folder.fold(event);
        if (outcome.kind === "replayed") {
          result.replayed++;
        } else {
          result.folded++;
        }
      } catch (error) {
        if (!isFoldRejection(error)) throw error;
        result.rejected++;
        indexerLog.foldRejected(
          log,
          error.code,
          event.transactionHash,
          { logIndex: event.logIndex, blockNumber: event.blockNumber.toString() },
          error.message
        );
      }
    }

    return result;
  }
}
