import mongoose, { Schema } from 'mongoose';

export interface ITransactionsCurrency {
  _id: string;
  name: string;
  charCode: string;
  numCode: string;
  sign: string;
  emoji: string;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt?: Date;
}

const transactionsCurrencySchema = new Schema<ITransactionsCurrency>(
  {
    _id: {
      type: String,
      required: true,
    },
    name: {
      type: String,
      required: true,
    },
    charCode: {
      type: String,
      required: true,
    },
    numCode: {
      type: String,
      required: true,
    },
    sign: {
      type: String,
      default: '',
    },
    emoji: {
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

export const TransactionsCurrencyModel = mongoose.model<ITransactionsCurrency>(
  'TransactionsCurrency',
  transactionsCurrencySchema
);
