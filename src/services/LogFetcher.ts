import type { Address, Hash, Hex } from "viem";
import type { LedgerPublicClient } from "../config/blockchain";
import { TransientFetchError } from "../lib/errors";
import type { RawLog } from "../types/events";

/**
 * Log as the ledger client returns it. Pending logs carry nulls.
 */
export interface LedgerLog {
  address: Address;
  topics: readonly Hex[];
  data: Hex;
  blockNumber: bigint | null;
  transactionHash: Hash | null;
  logIndex: number | null;
}

/**
 * The two ledger queries the indexer depends on
 */
export interface LedgerClient {
  getBlockNumber(): Promise<bigint>;
  getLogs(args: { address?: Address[]; fromBlock: bigint; toBlock: bigint }): Promise<readonly LedgerLog[]>;
}

/**
 * Adapt a viem public client to the ledger interface
 */
export const fromPublicClient = (client: LedgerPublicClient): LedgerClient => ({
  getBlockNumber: () => client.getBlockNumber({ cacheTime: 0 }),
  getLogs: ({ address, fromBlock, toBlock }) => client.getLogs({ address, fromBlock, toBlock }),
});

const compareLogs = (a: RawLog, b: RawLog): number => {
  if (a.blockNumber !== b.blockNumber) return a.blockNumber < b.blockNumber ? -1 : 1;
  return a.logIndex - b.logIndex;
};

/**
 * Reads raw logs for a fixed set of watched contracts, one block range at a time.
 * With no addresses every contract's logs are returned.
 */
export class LogFetcher {
  private readonly addresses: Address[];

  constructor(
    private readonly client: LedgerClient,
    addresses: readonly Address[]
  ) {
    this.addresses = [...addresses];
  }

  /**
   * Current chain head
   */
  async currentHead(): Promise<bigint> {
    try {
      return await this.client.getBlockNumber();
    } catch (error) {
      throw new TransientFetchError("eth_blockNumber", error);
    }
  }

  /**
   * Every log emitted by the watched contracts in `[fromBlock, toBlock]`,
   * ordered by (blockNumber, logIndex). Either the whole range or an error.
   */
  async fetchRange(fromBlock: bigint, toBlock: bigint): Promise<RawLog[]> {
    if (fromBlock < 0n || toBlock < fromBlock) {
      throw new RangeError(`Invalid block range ${fromBlock}-${toBlock}`);
    }

    let logs: readonly LedgerLog[];
    try {
      logs = await this.client.getLogs({
        address: this.addresses.length > 0 ? this.addresses : undefined,
        fromBlock,
        toBlock,
      });
    } catch (error) {
      throw new TransientFetchError(`eth_getLogs ${fromBlock}-${toBlock}`, error);
    }

    const mined: RawLog[] = [];
    for (const log of logs) {
      if (log.blockNumber === null || log.transactionHash === null || log.logIndex === null) {
        throw new TransientFetchError(
          `eth_getLogs ${fromBlock}-${toBlock}`,
          new Error("ledger returned a pending log")
        );
      }
      mined.push({
        address: log.address,
        topics: log.topics,
        data: log.data,
        blockNumber: log.blockNumber,
        transactionHash: log.transactionHash,
        logIndex: log.logIndex,
      });
    }

    return mined.sort(compareLogs);
  }
}
