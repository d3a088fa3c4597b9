import mongoose, { Document, Schema } from 'mongoose';

export interface IAd extends Document {
  _id: mongoose.Types.ObjectId;
  adId: string;
  name: string;
  adSetId: string;
  creativeType?: string;
  creativeUrl?: string;
  headline?: string;
  body?: string;
  testId?: string; // Ads sharing a testId are variants of one A/B test
  createdAt: Date;
  updatedAt: Date;
}

const AdSchema = new Schema<IAd>(
  {
    adId: {
      type: String,
      required: true,
      unique: true,
      trim: true,
    },
    name: {
      type: String,
      required: true,
    },
    adSetId: {
      type: String,
      required: true,
      index: true,
    },
    creativeType: {
      type: String,
    },
    creativeUrl: {
      type: String,
    },
    headline: {
      type: String,
    },
    body: {
      type: String,
    },
    testId: {
      type: String,
      index: true,
    },
  },
  {
    timestamps: true,
  }
);

export const Ad = mongoose.model<IAd>('Ad', AdSchema);
