import mongoose, { Document, Schema } from 'mongoose';

export interface IDailyPerformance extends Document {
  _id: mongoose.Types.ObjectId;
  date: string; // YYYY-MM-DD
  adId: string;
  campaignId: string;
  impressions: number;
  reach: number;
  frequency: number;
  clicks: number;
  spend: number;
  videoViews: number;
  addToCarts: number;
  conversions: number;
  revenue: number;
  createdAt: Date;
  updatedAt: Date;
}

const counter = { type: Number, default: 0, min: 0 };

const DailyPerformanceSchema = new Schema<IDailyPerformance>(
  {
    date: {
      type: String,
      required: true,
      match: /^\d{4}-\d{2}-\d{2}$/,
    },
    adId: {
      type: String,
      required: true,
    },
    campaignId: {
      type: String,
      required: true,
    },
    impressions: counter,
    reach: counter,
    frequency: counter,
    clicks: counter,
    spend: counter,
    videoViews: counter,
    addToCarts: counter,
    conversions: counter,
    revenue: counter,
  },
  {
    timestamps: true,
  }
);

// One row per ad per day: a second row would be double counted
DailyPerformanceSchema.index({ date: 1, adId: 1 }, { unique: true });
DailyPerformanceSchema.index({ campaignId: 1, date: 1 });

export const DailyPerformance = mongoose.model<IDailyPerformance>(
  'DailyPerformance',
  DailyPerformanceSchema
);
