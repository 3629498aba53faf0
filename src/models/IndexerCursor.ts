import mongoose, { Schema } from "mongoose";

export interface IIndexerCursor {
  name: string;
  lastProcessedBlock: number;
}

const IndexerCursorSchema = new Schema<IIndexerCursor>(
  {
    name: {
      type: String,
      required: true,
      unique: true,
    },
    lastProcessedBlock: {
      type: Number,
      required: true,
    },
  },
  {
    timestamps: true,
  }
);

export default mongoose.model<IIndexerCursor>("IndexerCursor", IndexerCursorSchema);
