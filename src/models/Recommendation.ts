import mongoose, { Document, Schema } from 'mongoose';
import { INSIGHT_STATUSES, InsightStatus } from './Alert';

export interface IRecommendation extends Document {
  _id: mongoose.Types.ObjectId;
  generationDate: string;
  adId: string;
  recommendationType: string;
  justification: string;
  status: InsightStatus;
  createdAt: Date;
  updatedAt: Date;
}

const RecommendationSchema = new Schema<IRecommendation>(
  {
    generationDate: {
      type: String,
      required: true,
    },
    adId: {
      type: String,
      required: true,
    },
    recommendationType: {
      type: String,
      required: true,
    },
    justification: {
      type: String,
      required: true,
    },
    status: {
      type: String,
      enum: INSIGHT_STATUSES,
      default: 'Active',
    },
  },
  {
    timestamps: true,
  }
);

RecommendationSchema.index({ status: 1, generationDate: -1 });

export const Recommendation = mongoose.model<IRecommendation>(
  'Recommendation',
  RecommendationSchema
);
