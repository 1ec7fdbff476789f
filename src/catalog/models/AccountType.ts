import mongoose, { Schema } from 'mongoose';

export interface IAccountType {
  _id: string;
  code: string;
  description: string;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt?: Date;
}

const accountTypeSchema = new Schema<IAccountType>(
  {
    _id: {
      type: String,
      required: true,
    },
    code: {
      type: String,
      required: true,
      maxlength: 50,
      index: true,
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

export const AccountTypeModel = mongoose.model<IAccountType>('AccountType', accountTypeSchema);
