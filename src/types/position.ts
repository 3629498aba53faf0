export const POSITION_STATUSES = ["active", "closed", "liquidated"] as const;
export type PositionStatus = (typeof POSITION_STATUSES)[number];

export const LIFECYCLE_OPERATIONS = ["Opened", "Closed", "Adjusted", "Unknown"] as const;
export type LifecycleOperation = (typeof LIFECYCLE_OPERATIONS)[number];

/**
 * One immutable audit record of a lifecycle event applied to a position
 */
export interface HistoryEntry {
  transactionHash: string;
  logIndex: number;
  /** `<txHash>:<logIndex>`, used to recognise replayed events */
  eventKey: string;
  collateral: number;
  debt: number;
  operation: LifecycleOperation;
  /** ISO-8601 time the event was folded */
  timestamp: string;
  blockNumber: number;
}

/**
 * Mutable fields of a position, replaced on every update
 */
export interface PositionState {
  collateral: number;
  debt: number;
  healthRatio: number;
  status: PositionStatus;
  blockNumber: number;
}

export interface Position extends PositionState {
  positionId: number;
  walletAddress: string;
  asset: string;
  history: HistoryEntry[];
}

export const isTerminal = (status: PositionStatus): boolean => status !== "active";
