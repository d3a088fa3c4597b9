import mongoose, { Document, Schema } from 'mongoose';

export interface IABTest extends Document {
  _id: mongoose.Types.ObjectId;
  testId: string;
  name: string;
  hypothesis?: string;
  startDate?: string;
  endDate?: string;
  createdAt: Date;
  updatedAt: Date;
}

const ABTestSchema = new Schema<IABTest>(
  {
    testId: {
      type: String,
      required: true,
      unique: true,
    },
    name: {
      type: String,
      required: true,
    },
    hypothesis: {
      type: String,
    },
    startDate: {
      type: String,
    },
    endDate: {
      type: String,
    },
  },
  {
    timestamps: true,
  }
);

export const ABTest = mongoose.model<IABTest>('ABTest', ABTestSchema);
