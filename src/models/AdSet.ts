import mongoose, { Document, Schema } from 'mongoose';

export interface IAdSet extends Document {
  _id: mongoose.Types.ObjectId;
  adSetId: string;
  name: string;
  campaignId: string;
  targetingCriteria: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

const AdSetSchema = new Schema<IAdSet>(
  {
    adSetId: {
      type: String,
      required: true,
      unique: true,
      trim: true,
    },
    name: {
      type: String,
      required: true,
    },
    campaignId: {
      type: String,
      required: true,
      index: true,
    },
    targetingCriteria: {
      type: Schema.Types.Mixed,
      default: {},
    },
  },
  {
    timestamps: true,
  }
);

export const AdSet = mongoose.model<IAdSet>('AdSet', AdSetSchema);
