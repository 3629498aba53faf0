import { decodeAbiParameters, type Hex } from "viem";
import { ActivePositionExistsError, PositionNotFoundError, PositionTerminatedError } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { toDecimal, type DecimalScales } from "../lib/units";
import { eventKey, type DomainEventOf } from "../types/events";
import {
  isTerminal,
  type HistoryEntry,
  type LifecycleOperation,
  type Position,
  type PositionState,
  type PositionStatus,
} from "../types/position";
import type { PositionGateway } from "./PositionGateway";

const log = createLogger("PositionFolder");

export type TroveUpdatedEvent = DomainEventOf<"TroveUpdated">;

/**
 * Values a TroveUpdated event contributes to position state
 */
export interface TroveUpdate {
  walletAddress: string;
  asset: string;
  collateral: number;
  debt: number;
  operation: LifecycleOperation;
  healthRatio: number;
}

export type FoldOutcome =
  | { kind: "created"; position: Position }
  | { kind: "updated"; position: Position }
  | { kind: "replayed"; eventKey: string };

export interface PositionFolderOptions {
  decimals: DecimalScales;
  /** Clock for history timestamps */
  now?: () => Date;
}

export function operationFromCode(code: number): LifecycleOperation {
  switch (code) {
    case 0:
      return "Opened";
    case 1:
      return "Closed";
    case 2:
      return "Adjusted";
    default:
      return "Unknown";
  }
}

/**
 * Debt-to-collateral ratio as a percentage with two decimals; 0 without collateral
 */
export function calculateHealthRatio(debt: number, collateral: number): number {
  if (collateral === 0) {
    return 0;
  }
  return Math.round((debt / collateral) * 10000) / 100;
}

export function resolveStatus(operation: LifecycleOperation, debt: number): PositionStatus {
  if (operation === "Closed") return "closed";
  if (debt === 0) return "liquidated";
  return "active";
}

/**
 * Lowercased address held in an indexed topic, or "" when the topic is absent
 */
export function topicAddress(topic: Hex | undefined): string {
  if (!topic) return "";
  const [address] = decodeAbiParameters([{ type: "address" }], topic);
  return address.toLowerCase();
}

export function deriveTroveUpdate(event: TroveUpdatedEvent, decimals: DecimalScales): TroveUpdate {
  const walletAddress = topicAddress(event.indexed[0]);
  const asset = topicAddress(event.indexed[1]);
  const scale = decimals.forAsset(asset);
  const collateral = toDecimal(event.fields._coll, scale.collateral);
  const debt = toDecimal(event.fields._debt, scale.debt);

  return {
    walletAddress,
    asset,
    collateral,
    debt,
    operation: operationFromCode(event.fields._operation),
    healthRatio: calculateHealthRatio(debt, collateral),
  };
}

/**
 * Folds TroveUpdated events into position lifecycle state.
 *
 * Opened inserts a new position with the next identity. Every other operation
 * updates the latest position of the (wallet, asset) pair, which must exist
 * and still be active. Replayed events are recognised by their event key and
 * leave the store untouched.
 */
export class PositionFolder {
  private readonly now: () => Date;

  constructor(
    private readonly gateway: PositionGateway,
    private readonly options: PositionFolderOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async fold(event: TroveUpdatedEvent): Promise<FoldOutcome> {
    const key = eventKey(event);
    if (await this.gateway.hasEvent(key)) {
      log.debug({ eventKey: key }, "Event already applied");
      return { kind: "replayed", eventKey: key };
    }

    const update = deriveTroveUpdate(event, this.options.decimals);
    const blockNumber = Number(event.blockNumber);
    const entry: HistoryEntry = {
      transactionHash: event.transactionHash.toLowerCase(),
      logIndex: event.logIndex,
      eventKey: key,
      collateral: update.collateral,
      debt: update.debt,
      operation: update.operation,
      timestamp: this.now().toISOString(),
      blockNumber,
    };

    log.debug(
      {
        walletAddress: update.walletAddress,
        asset: update.asset,
        collateral: update.collateral,
        debt: update.debt,
        operation: update.operation,
        topics: event.indexed.length,
      },
      "Decoded TroveUpdated"
    );

    if (update.operation === "Opened") {
      return this.open(update, entry, blockNumber);
    }
    return this.update(update, entry, blockNumber);
  }

  private async open(update: TroveUpdate, entry: HistoryEntry, blockNumber: number): Promise<FoldOutcome> {
    const active = await this.gateway.findActive(update.walletAddress, update.asset);
    if (active) {
      throw new ActivePositionExistsError(active.positionId);
    }

    const position: Position = {
      positionId: await this.gateway.nextIdentity(),
      walletAddress: update.walletAddress,
      asset: update.asset,
      collateral: update.collateral,
      debt: update.debt,
      healthRatio: update.healthRatio,
      status: "active",
      blockNumber,
      history: [entry],
    };

    await this.gateway.insert(position);
    log.info(
      { positionId: position.positionId, walletAddress: position.walletAddress, asset: position.asset },
      "Position opened"
    );
    return { kind: "created", position };
  }

  private async update(update: TroveUpdate, entry: HistoryEntry, blockNumber: number): Promise<FoldOutcome> {
    const latest = await this.gateway.findLatest(update.walletAddress, update.asset);
    if (!latest) {
      throw new PositionNotFoundError(update.walletAddress, update.asset);
    }
    if (isTerminal(latest.status)) {
      throw new PositionTerminatedError(latest.positionId, latest.status);
    }

    const state: PositionState = {
      collateral: update.collateral,
      debt: update.debt,
      healthRatio: update.healthRatio,
      status: resolveStatus(update.operation, update.debt),
      blockNumber,
    };

    const position = await this.gateway.updateLatest(
      update.walletAddress,
      update.asset,
      "active",
      state,
      entry
    );
    log.info(
      {
        positionId: position.positionId,
        status: position.status,
        collateral: position.collateral,
        debt: position.debt,
        healthRatio: position.healthRatio,
      },
      "Position updated"
    );
    return { kind: "updated", position };
  }
}
