import mongoose, { Schema } from 'mongoose';

import { Role } from '../../types/role';

export interface IRegistryHolder {
  _id: string;
  telegramId: number;
  role: Role;
  createdAt: Date;
  updatedAt?: Date;
}

const registryHolderSchema = new Schema<IRegistryHolder>(
  {
    _id: {
      type: String,
      required: true,
    },
    telegramId: {
      type: Number,
      required: true,
      unique: true,
      index: true,
    },
    role: {
      type: String,
      enum: Object.values(Role),
      required: true,
      default: Role.User,
    },
  },
  {
    timestamps: true,
    versionKey: false,
  }
);

export const RegistryHolderModel = mongoose.model<IRegistryHolder>('RegistryHolder', registryHolderSchema);
