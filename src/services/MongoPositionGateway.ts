import mongoose, { type HydratedDocument } from "mongoose";
import PositionModel, { type IPosition } from "../models/Position";
import LedgerEventRecordModel from "../models/LedgerEventRecord";
import { DuplicateIdentityError, NotFoundError, PersistenceError } from "../lib/errors";
import { createLogger } from "../lib/logger";
import type { HistoryEntry, Position, PositionState, PositionStatus } from "../types/position";
import type { LedgerEventRecordInput, PositionGateway } from "./PositionGateway";

const log = createLogger("MongoPositionGateway");

const DUPLICATE_KEY = 11000;

function toPosition(doc: HydratedDocument<IPosition>): Position {
  return {
    positionId: doc.positionId,
    walletAddress: doc.walletAddress,
    asset: doc.asset,
    collateral: doc.collateral,
    debt: doc.debt,
    healthRatio: doc.healthRatio,
    status: doc.status,
    blockNumber: doc.blockNumber,
    history: doc.history.map((entry) => ({
      transactionHash: entry.transactionHash,
      logIndex: entry.logIndex,
      eventKey: entry.eventKey,
      collateral: entry.collateral,
      debt: entry.debt,
      operation: entry.operation,
      timestamp: entry.timestamp,
      blockNumber: entry.blockNumber,
    })),
  };
}

function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof mongoose.mongo.MongoServerError && error.code === DUPLICATE_KEY;
}

/**
 * Position persistence backed by the Position and LedgerEventRecord collections
 */
export class MongoPositionGateway implements PositionGateway {
  async nextIdentity(): Promise<number> {
    const last = await this.run("nextIdentity", () =>
      PositionModel.findOne({}, { positionId: 1 }).sort({ positionId: -1 }).exec()
    );
    return last ? last.positionId + 1 : 1;
  }

  async insert(position: Position): Promise<void> {
    try {
      await PositionModel.create(position);
      log.debug({ positionId: position.positionId }, "Saved position");
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new DuplicateIdentityError(position.positionId, error);
      }
      throw new PersistenceError("insert", error);
    }
  }

  async findLatest(walletAddress: string, asset: string): Promise<Position | null> {
    const doc = await this.run("findLatest", () =>
      PositionModel.findOne({ walletAddress, asset }).sort({ positionId: -1 }).exec()
    );
    return doc ? toPosition(doc) : null;
  }

  async findActive(walletAddress: string, asset: string): Promise<Position | null> {
    const doc = await this.run("findActive", () =>
      PositionModel.findOne({ walletAddress, asset, status: "active" }).sort({ positionId: -1 }).exec()
    );
    return doc ? toPosition(doc) : null;
  }

  async hasEvent(eventKey: string): Promise<boolean> {
    const existing = await this.run("hasEvent", () =>
      PositionModel.exists({ "history.eventKey": eventKey }).exec()
    );
    return existing !== null;
  }

  async updateLatest(
    walletAddress: string,
    asset: string,
    statusFilter: PositionStatus | null,
    state: PositionState,
    entry: HistoryEntry
  ): Promise<Position> {
    const filter = statusFilter === null ? { walletAddress, asset } : { walletAddress, asset, status: statusFilter };

    const latest = await this.run("updateLatest.find", () =>
      PositionModel.findOne(filter).sort({ positionId: -1 }).exec()
    );
    if (!latest) {
      throw new NotFoundError(filter);
    }

    const updated = await this.run("updateLatest.update", () =>
      PositionModel.findOneAndUpdate(
        { positionId: latest.positionId, "history.eventKey": { $ne: entry.eventKey } },
        { $set: { ...state }, $push: { history: entry } },
        { new: true }
      ).exec()
    );

    // Entry already present: the event was applied before
    return toPosition(updated ?? latest);
  }

  async recordEvent(record: LedgerEventRecordInput): Promise<void> {
    await this.run("recordEvent", () =>
      LedgerEventRecordModel.updateOne(
        { eventKey: record.eventKey },
        { $setOnInsert: record },
        { upsert: true }
      ).exec()
    );
  }

  async findById(positionId: number): Promise<Position | null> {
    const doc = await this.run("findById", () => PositionModel.findOne({ positionId }).exec());
    return doc ? toPosition(doc) : null;
  }

  async findByWallet(walletAddress: string): Promise<Position[]> {
    const docs = await this.run("findByWallet", () =>
      PositionModel.find({ walletAddress: walletAddress.toLowerCase() }).sort({ positionId: -1 }).exec()
    );
    return docs.map(toPosition);
  }

  async listActive(): Promise<Position[]> {
    const docs = await this.run("listActive", () => PositionModel.find({ status: "active" }).exec());
    return docs.map(toPosition);
  }

  private async run<T>(operation: string, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      log.error(
        { operation, error: error instanceof Error ? error.message : String(error) },
        "Store operation failed"
      );
      throw new PersistenceError(operation, error);
    }
  }
}
