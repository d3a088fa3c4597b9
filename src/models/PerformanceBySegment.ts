import mongoose, { Document, Schema } from 'mongoose';

export interface IPerformanceBySegment extends Document {
  _id: mongoose.Types.ObjectId;
  date: string;
  adId: string;
  campaignId: string;
  segmentType: string; // e.g. 'age', 'gender', 'device'
  segmentValue: string;
  impressions: number;
  clicks: number;
  spend: number;
  conversions: number;
  revenue: number;
}

const counter = { type: Number, default: 0, min: 0 };

const PerformanceBySegmentSchema = new Schema<IPerformanceBySegment>(
  {
    date: { type: String, required: true },
    adId: { type: String, required: true },
    campaignId: { type: String, required: true },
    segmentType: { type: String, required: true },
    segmentValue: { type: String, required: true },
    impressions: counter,
    clicks: counter,
    spend: counter,
    conversions: counter,
    revenue: counter,
  },
  {
    timestamps: true,
  }
);

PerformanceBySegmentSchema.index(
  { date: 1, adId: 1, segmentType: 1, segmentValue: 1 },
  { unique: true }
);

export const PerformanceBySegment = mongoose.model<IPerformanceBySegment>(
  'PerformanceBySegment',
  PerformanceBySegmentSchema
);
