import mongoose, { Document, Schema } from 'mongoose';

export const INSIGHT_STATUSES = ['Active', 'Dismissed', 'Resolved'] as const;

export type InsightStatus = (typeof INSIGHT_STATUSES)[number];

export interface IAlert extends Document {
  _id: mongoose.Types.ObjectId;
  alertDate: string;
  metric: string;
  adId: string;
  justification: string;
  status: InsightStatus;
  createdAt: Date;
  updatedAt: Date;
}

const AlertSchema = new Schema<IAlert>(
  {
    alertDate: {
      type: String,
      required: true,
    },
    metric: {
      type: String,
      required: true,
    },
    adId: {
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

AlertSchema.index({ status: 1, alertDate: -1 });

export const Alert = mongoose.model<IAlert>('Alert', AlertSchema);
