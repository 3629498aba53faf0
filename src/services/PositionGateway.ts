import type { DomainEvent } from "../types/events";
import { eventKey } from "../types/events";
import type { HistoryEntry, Position, PositionState, PositionStatus } from "../types/position";

/**
 * Raw audit record of one decoded ledger event
 */
export interface LedgerEventRecordInput {
  eventKey: string;
  event: string;
  contract: string;
  transactionHash: string;
  logIndex: number;
  blockNumber: number;
  decodedData: Record<string, string | number>;
  timestamp: Date;
}

/**
 * Document store operations the indexer and the read API rely on.
 *
 * Write paths are idempotent per event key: re-applying a history entry whose
 * key is already on the position leaves it unchanged.
 */
export interface PositionGateway {
  /** One greater than the highest assigned identity, or 1 */
  nextIdentity(): Promise<number>;
  /** @throws DuplicateIdentityError when the identity is taken */
  insert(position: Position): Promise<void>;
  /** Most recently created position for the pair, whatever its status */
  findLatest(walletAddress: string, asset: string): Promise<Position | null>;
  findActive(walletAddress: string, asset: string): Promise<Position | null>;
  /** Whether a position history already holds this event */
  hasEvent(eventKey: string): Promise<boolean>;
  /**
   * Replace the mutable fields of the most recent match and append the entry.
   *
   * @param statusFilter - restrict the match to this status, or `null` for any
   * @throws NotFoundError when nothing matches
   */
  updateLatest(
    walletAddress: string,
    asset: string,
    statusFilter: PositionStatus | null,
    state: PositionState,
    entry: HistoryEntry
  ): Promise<Position>;
  /** Upsert the raw audit record of a decoded event */
  recordEvent(record: LedgerEventRecordInput): Promise<void>;
  findById(positionId: number): Promise<Position | null>;
  /** Positions of a wallet, newest first */
  findByWallet(walletAddress: string): Promise<Position[]>;
  listActive(): Promise<Position[]>;
}

/**
 * Build the audit record for a decoded event. Bigints are stored as decimal strings.
 */
export function toLedgerEventRecord(event: DomainEvent, timestamp: Date): LedgerEventRecordInput {
  const decodedData: Record<string, string | number> = {};
  for (const [field, value] of Object.entries(event.fields)) {
    decodedData[field] = typeof value === "bigint" ? value.toString() : value;
  }

  return {
    eventKey: eventKey(event),
    event: event.name,
    contract: event.contract,
    transactionHash: event.transactionHash.toLowerCase(),
    logIndex: event.logIndex,
    blockNumber: Number(event.blockNumber),
    decodedData,
    timestamp,
  };
}
