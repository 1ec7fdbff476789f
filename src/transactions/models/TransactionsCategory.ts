import mongoose, { Schema } from 'mongoose';

export interface ITransactionsCategory {
  _id: string;
  holderId: string;
  income: boolean;
  expense: boolean;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt?: Date;
}

const transactionsCategorySchema = new Schema<ITransactionsCategory>(
  {
    _id: {
      type: String,
      required: true,
    },
    holderId: {
      type: String,
      required: true,
      index: true,
    },
    income: {
      type: Boolean,
      default: false,
    },
    expense: {
      type: Boolean,
      default: false,
    },
    isDeleted: {
      type: Boolean,
      default: false,
    },
  },
  {
    timestamps: true,
    versionKey: false,
  }
);

export const TransactionsCategoryModel = mongoose.model<ITransactionsCategory>(
  'TransactionsCategory',
  transactionsCategorySchema
);
