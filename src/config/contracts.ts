import path from "path";
import type { WatchedContractSource } from "../services/DecodingTable";
import type { IndexerConfig } from "./env";

/**
 * Contracts whose logs feed the position view, with their ABI files
 */
export const getWatchedContracts = (config: IndexerConfig): WatchedContractSource[] => [
  {
    label: "TroveManager",
    address: config.contracts.troveManager,
    abiPath: path.join(config.abiDir, "TroveManager.json"),
  },
  {
    label: "BorrowerOperations",
    address: config.contracts.borrowerOperations,
    abiPath: path.join(config.abiDir, "BorrowerOperations.json"),
  },
];
