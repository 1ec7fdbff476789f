import mongoose, { Schema } from 'mongoose';

export interface IExchangeRate {
  _id: string;
  currencyId: string;
  rateDate: Date;
  rate: number;
  createdAt: Date;
  updatedAt?: Date;
}

const exchangeRateSchema = new Schema<IExchangeRate>(
  {
    _id: {
      type: String,
      required: true,
    },
    currencyId: {
      type: String,
      required: true,
    },
    rateDate: {
      type: Date,
      required: true,
    },
    rate: {
      type: Number,
      required: true,
    },
  },
  {
    timestamps: true,
    versionKey: false,
  }
);

// One rate per currency and day
exchangeRateSchema.index({ currencyId: 1, rateDate: 1 }, { unique: true });

export const ExchangeRateModel = mongoose.model<IExchangeRate>('ExchangeRate', exchangeRateSchema);
