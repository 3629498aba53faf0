import mongoose, { Schema } from "mongoose";
import type { LedgerEventRecordInput } from "../services/PositionGateway";

export type ILedgerEventRecord = LedgerEventRecordInput;

const LedgerEventRecordSchema = new Schema<ILedgerEventRecord>(
  {
    eventKey: {
      type: String,
      required: true,
      unique: true,
    },
    event: {
      type: String,
      required: true,
      index: true,
    },
    contract: {
      type: String,
      required: true,
      lowercase: true,
    },
    transactionHash: {
      type: String,
      required: true,
      lowercase: true,
      index: true,
    },
    logIndex: {
      type: Number,
      required: true,
    },
    blockNumber: {
      type: Number,
      required: true,
      index: true,
    },
    decodedData: {
      type: Schema.Types.Mixed,
      default: {},
    },
    timestamp: {
      type: Date,
      required: true,
    },
  },
  {
    timestamps: true,
  }
);

export default mongoose.model<ILedgerEventRecord>(
  "LedgerEventRecord",
  LedgerEventRecordSchema
);
