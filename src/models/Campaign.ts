import mongoose, { Document, Schema } from 'mongoose';

export const PLATFORMS = ['Meta', 'Google', 'TikTok', 'Snapchat'] as const;
export const FUNNEL_STAGES = ['TOF', 'MOF', 'BOF'] as const;

export type FunnelStage = (typeof FUNNEL_STAGES)[number];

export interface ICampaign extends Document {
  _id: mongoose.Types.ObjectId;
  campaignId: string;
  name: string;
  platform: string;
  objective?: string;
  funnelStage?: FunnelStage;
  createdAt: Date;
  updatedAt: Date;
}

const CampaignSchema = new Schema<ICampaign>(
  {
    campaignId: {
      type: String,
      required: true,
      unique: true,
      trim: true,
    },
    name: {
      type: String,
      required: true,
      trim: true,
    },
    platform: {
      type: String,
      required: true,
    },
    objective: {
      type: String,
    },
    funnelStage: {
      type: String,
      enum: FUNNEL_STAGES,
    },
  },
  {
    timestamps: true,
  }
);

CampaignSchema.index({ platform: 1, name: 1 });

export const Campaign = mongoose.model<ICampaign>('Campaign', CampaignSchema);
