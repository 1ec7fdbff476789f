import mongoose, { Schema } from 'mongoose';

import { Role } from '../../types/role';

/**
 * Local copy of a catalog registry holder
 */
export interface ITransactionHolder {
  _id: string;
  telegramId: number;
  role: Role;
  createdAt: Date;
  updatedAt?: Date;
}

const transactionHolderSchema = new Schema<ITransactionHolder>(
  {
    _id: {
      type: String,
      required: true,
    },
    telegramId: {
      type: Number,
      required: true,
      index: true,
    },
    role: {
      type: String,
      enum: Object.values(Role),
      default: Role.User,
    },
  },
  {
    timestamps: true,
    versionKey: false,
  }
);

export const TransactionHolderModel = mongoose.model<ITransactionHolder>('TransactionHolder', transactionHolderSchema);
