import mongoose, { Schema } from 'mongoose';

export interface ICountry {
  _id: string;
  name: string;
  createdAt: Date;
  updatedAt?: Date;
}

const countrySchema = new Schema<ICountry>(
  {
    _id: {
      type: String,
      required: true,
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

// Case-insensitive uniqueness is enforced by the service; the index serves lookups
countrySchema.index({ name: 1 });

export const CountryModel = mongoose.model<ICountry>('Country', countrySchema);
