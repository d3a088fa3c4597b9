import mongoose, { Document, Schema } from 'mongoose';

export interface IPerformanceByCountry extends Document {
  _id: mongoose.Types.ObjectId;
  date: string;
  platform: string;
  country: string;
  impressions: number;
  clicks: number;
  spend: number;
  conversions: number;
  revenue: number;
}

const counter = { type: Number, default: 0, min: 0 };

const PerformanceByCountrySchema = new Schema<IPerformanceByCountry>(
  {
    date: { type: String, required: true },
    platform: { type: String, required: true },
    country: { type: String, required: true },
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

PerformanceByCountrySchema.index({ date: 1, platform: 1, country: 1 }, { unique: true });

export const PerformanceByCountry = mongoose.model<IPerformanceByCountry>(
  'PerformanceByCountry',
  PerformanceByCountrySchema
);
