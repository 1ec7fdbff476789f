import mongoose, { Schema } from 'mongoose';

export interface ICategory {
  _id: string;
  registryHolderId: string;
  name: string;
  income: boolean;
  expense: boolean;
  emoji: string;
  icon: string;
  parentId: string | null;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt?: Date;
}

const categorySchema = new Schema<ICategory>(
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
    name: {
      type: String,
      required: true,
      maxlength: 100,
    },
    income: {
      type: Boolean,
      default: false,
    },
    expense: {
      type: Boolean,
      default: false,
    },
    emoji: {
      type: String,
      default: '',
    },
    icon: {
      type: String,
      default: '',
    },
    parentId: {
      type: String,
      default: null,
      index: true,
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

categorySchema.index({ registryHolderId: 1, parentId: 1, name: 1 });

export const CategoryModel = mongoose.model<ICategory>('Category', categorySchema);
