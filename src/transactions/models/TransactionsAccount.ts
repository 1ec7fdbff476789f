import mongoose, { Schema } from 'mongoose';

export interface ITransactionsAccount {
  _id: string;
  holderId: string;
  accountTypeId: string;
  currencyId: string;
  creditLimit: number | null;
  isArchived: boolean;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt?: Date;
}

const transactionsAccountSchema = new Schema<ITransactionsAccount>(
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
    accountTypeId: {
      type: String,
      required: true,
    },
    currencyId: {
      type: String,
      required: true,
    },
    creditLimit: {
      type: Number,
      default: null,
    },
    isArchived: {
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

export const TransactionsAccountModel = mongoose.model<ITransactionsAccount>(
  'TransactionsAccount',
  transactionsAccountSchema
);
