import IndexerCursorModel from "../models/IndexerCursor";
import { PersistenceError } from "../lib/errors";

/**
 * Durable checkpoint of the last fully processed block
 */
export interface CursorStore {
  load(): Promise<bigint | null>;
  save(lastProcessedBlock: bigint): Promise<void>;
}

export class MongoCursorStore implements CursorStore {
  constructor(private readonly name: string) {}

  async load(): Promise<bigint | null> {
    try {
      const cursor = await IndexerCursorModel.findOne({ name: this.name }).exec();
      return cursor ? BigInt(cursor.lastProcessedBlock) : null;
    } catch (error) {
      throw new PersistenceError("cursor.load", error);
    }
  }

  async save(lastProcessedBlock: bigint): Promise<void> {
    try {
      await IndexerCursorModel.updateOne(
        { name: this.name },
        { $set: { lastProcessedBlock: Number(lastProcessedBlock) } },
        { upsert: true }
      ).exec();
    } catch (error) {
      throw new PersistenceError("cursor.save", error);
    }
  }
}

/**
 * Process-local cursor, used by tests
 */
export class InMemoryCursorStore implements CursorStore {
  constructor(private lastProcessedBlock: bigint | null = null) {}

  async load(): Promise<bigint | null> {
    return this.lastProcessedBlock;
  }

  async save(lastProcessedBlock: bigint): Promise<void> {
    this.lastProcessedBlock = lastProcessedBlock;
  }
}
