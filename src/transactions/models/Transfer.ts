import mongoose, { Schema } from 'mongoose';

export interface ITransfer {
  _id: string;
  date: Date;
  fromAccountId: string;
  toAccountId: string;
  fromAmount: number;
  toAmount: number;
  description: string;
  createdAt: Date;
  updatedAt?: Date;
}

const transferSchema = new Schema<ITransfer>(
  {
    _id: {
      type: String,
      required: true,
    },
    date: {
      type: Date,
      required: true,
      index: true,
    },
    fromAccountId: {
      type: String,
      required: true,
      index: true,
    },
    toAccountId: {
      type: String,
      required: true,
      index: true,
    },
    fromAmount: {
      type: Number,
      required: true,
    },
    toAmount: {
      type: Number,
      required: true,
    },
    description: {
      type: String,
      default: '',
      maxlength: 500,
    },
  },
  {
    timestamps: true,
    versionKey: false,
  }
);

export const TransferModel = mongoose.model<ITransfer>('Transfer', transferSchema);
