import mongoose, { Schema } from 'mongoose';

export interface IBank {
  _id: string;
  countryId: string;
  name: string;
  createdAt: Date;
  updatedAt?: Date;
}

const bankSchema = new Schema<IBank>(
  {
    _id: {
      type: String,
      required: true,
    },
    countryId: {
      type: String,
      required: true,
      index: true,
    },
    name: {
      type: String,
      required: true,
      trim: true,
      maxlength: 100,
    },
  },
  {
    timestamps: true,
    versionKey: false,
  }
);

bankSchema.index({ countryId: 1, name: 1 });

export const BankModel = mongoose.model<IBank>('Bank', bankSchema);
