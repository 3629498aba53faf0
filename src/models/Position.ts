import mongoose, { Schema } from "mongoose";
import {
  LIFECYCLE_OPERATIONS,
  POSITION_STATUSES,
  type HistoryEntry,
  type Position,
} from "../types/position";

export type IPosition = Position;

const HistoryEntrySchema = new Schema<HistoryEntry>(
  {
    transactionHash: {
      type: String,
      required: true,
      lowercase: true,
    },
    logIndex: {
      type: Number,
      required: true,
    },
    eventKey: {
      type: String,
      required: true,
    },
    collateral: {
      type: Number,
      required: true,
    },
    debt: {
      type: Number,
      required: true,
    },
    operation: {
      type: String,
      enum: LIFECYCLE_OPERATIONS,
      required: true,
    },
    timestamp: {
      type: String,
      required: true,
    },
    blockNumber: {
      type: Number,
      required: true,
    },
  },
  { _id: false }
);

const PositionSchema = new Schema<IPosition>(
  {
    positionId: {
      type: Number,
      required: true,
      unique: true,
    },
    walletAddress: {
      type: String,
      lowercase: true,
      default: "",
      index: true,
    },
    asset: {
      type: String,
      lowercase: true,
      default: "",
    },
    collateral: {
      type: Number,
      required: true,
    },
    debt: {
      type: Number,
      required: true,
    },
    healthRatio: {
      type: Number,
      required: true,
    },
    status: {
      type: String,
      enum: POSITION_STATUSES,
      default: "active",
      index: true,
    },
    blockNumber: {
      type: Number,
      required: true,
    },
    history: {
      type: [HistoryEntrySchema],
      default: [],
    },
  },
  {
    timestamps: true,
  }
);

// Latest position per pair
PositionSchema.index({ walletAddress: 1, asset: 1, positionId: -1 });
// Replay detection
PositionSchema.index({ "history.eventKey": 1 });

export default mongoose.model<IPosition>("Position", PositionSchema);
