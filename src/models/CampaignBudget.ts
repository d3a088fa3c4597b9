import mongoose, { Document, Schema } from 'mongoose';

export interface ICampaignBudget extends Document {
  _id: mongoose.Types.ObjectId;
  campaignId: string;
  startDate: string; // YYYY-MM-DD, inclusive
  endDate: string; // YYYY-MM-DD, inclusive
  totalBudget: number;
  createdAt: Date;
  updatedAt: Date;
}

const CampaignBudgetSchema = new Schema<ICampaignBudget>(
  {
    campaignId: {
      type: String,
      required: true,
      unique: true,
    },
    startDate: {
      type: String,
      required: true,
      match: /^\d{4}-\d{2}-\d{2}$/,
    },
    endDate: {
      type: String,
      required: true,
      match: /^\d{4}-\d{2}-\d{2}$/,
      validate: {
        validator(this: ICampaignBudget, value: string): boolean {
          return value >= this.startDate;
        },
        message: 'endDate must not be before startDate',
      },
    },
    totalBudget: {
      type: Number,
      required: true,
      min: 0,
    },
  },
  {
    timestamps: true,
  }
);

export const CampaignBudget = mongoose.model<ICampaignBudget>(
  'CampaignBudget',
  CampaignBudgetSchema
);
