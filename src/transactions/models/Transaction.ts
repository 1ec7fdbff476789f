import mongoose, { Schema } from 'mongoose';

export interface ITransaction {
  _id: string;
  date: Date;
  accountId: string;
  categoryId: string;
  amount: number;
  description: string;
  createdAt: Date;
  updatedAt?: Date;
}

const transactionSchema = new Schema<ITransaction>(
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
    accountId: {
      type: String,
      required: true,
      index: true,
    },
    categoryId: {
      type: String,
      required: true,
      index: true,
    },
    amount: {
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

export const TransactionModel = mongoose.model<ITransaction>('Transaction', transactionSchema);
