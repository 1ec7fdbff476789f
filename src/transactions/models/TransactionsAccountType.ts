import mongoose, { Schema } from 'mongoose';

export interface ITransactionsAccountType {
  _id: string;
  code: string;
  description: string;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt?: Date;
}

const transactionsAccountTypeSchema = new Schema<ITransactionsAccountType>(
  {
    _id: {
      type: String,
      required: true,
    },
    code: {
      type: String,
      required: true,
    },
    description: {
      type: String,
      default: '',
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

export const TransactionsAccountTypeModel = mongoose.model<ITransactionsAccountType>(
  'TransactionsAccountType',
  transactionsAccountTypeSchema
);
