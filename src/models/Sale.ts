import mongoose, { Document, Schema } from 'mongoose';

export interface ISale extends Document {
  _id: mongoose.Types.ObjectId;
  saleId: string;
  customerId: string;
  saleDate: string;
  saleAmount: number;
}

const SaleSchema = new Schema<ISale>(
  {
    saleId: {
      type: String,
      required: true,
      unique: true,
    },
    customerId: {
      type: String,
      required: true,
      index: true,
    },
    saleDate: {
      type: String,
      required: true,
    },
    saleAmount: {
      type: Number,
      required: true,
    },
  },
  {
    timestamps: true,
  }
);

export const Sale = mongoose.model<ISale>('Sale', SaleSchema);
