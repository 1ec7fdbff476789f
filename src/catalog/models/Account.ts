import mongoose, { Schema } from 'mongoose';

export interface IAccount {
  _id: string;
  registryHolderId: string;
  accountTypeId: string;
  currencyId: string;
  bankId: string | null;
  name: string;
  isIncludeInBalance: boolean;
  isDefault: boolean;
  isArchived: boolean;
  isDeleted: boolean;
  creditLimit: number | null;
  createdAt: Date;
  updatedAt?: Date;
}

const accountSchema = new Schema<IAccount>(
  {
    _id: {
      type: String,
      required: true,
    },
    registryHolderId: {
      type: String,
      required: true,
      index: true,
    },
    accountTypeId: {
      type: String,
      required: true,
      index: true,
    },
    currencyId: {
      type: String,
      required: true,
      index: true,
    },
    bankId: {
      type: String,
      default: null,
      index: true,
    },
    name: {
      type: String,
      required: true,
      maxlength: 100,
    },
    isIncludeInBalance: {
      type: Boolean,
      default: true,
    },
    isDefault: {
      type: Boolean,
      default: false,
    },
    isArchived: {
      type: Boolean,
      default: false,
    },
    isDeleted: {
      type: Boolean,
      default: false,
    },
    creditLimit: {
      type: Number,
      default: null,
    },
  },
  {
    timestamps: true,
    versionKey: false,
  }
);

// Default account lookup per holder
accountSchema.index({ registryHolderId: 1, isDefault: 1 });

export const AccountModel = mongoose.model<IAccount>('Account', accountSchema);
