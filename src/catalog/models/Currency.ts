import mongoose, { Schema } from 'mongoose';

export interface ICurrency {
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

const currencySchema = new Schema<ICurrency>(
  {
    _id: {
      type: String,
      required: true,
    },
    name: {
      type: String,
      required: true,
      maxlength: 100,
    },
    charCode: {
      type: String,
      required: true,
      maxlength: 3,
      index: true,
    },
    numCode: {
      type: String,
      required: true,
      maxlength: 3,
      index: true,
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

export const CurrencyModel = mongoose.model<ICurrency>('Currency', currencySchema);
