import { createPublicClient, http } from "viem";
import { buildLedgerChain } from "./chains";
import type { IndexerConfig } from "./env";

/**
 * Public client for reading blocks, logs and contract state from the ledger.
 * Retries are left to the tailing scheduler.
 */
export const createLedgerClient = (config: IndexerConfig) =>
  createPublicClient({
    chain: buildLedgerChain(config.chainId, config.chainName, config.rpcUrl),
    transport: http(config.rpcUrl, {
      retryCount: 0,
      timeout: 30_000,
    }),
  });

export type LedgerPublicClient = ReturnType<typeof createLedgerClient>;
