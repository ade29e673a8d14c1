import mongoose, { Model, Schema } from 'mongoose';

export interface ICategory {
  _id: number;
  slug: string;
  title: string;
}

const CategorySchema = new Schema<ICategory>(
  {
    _id: { type: Number, required: true },
    slug: { type: String, required: true, unique: true, maxlength: 50 },
    title: { type: String, required: true, unique: true, maxlength: 255 },
  },
  { versionKey: false }
);

export const Category: Model<ICategory> = mongoose.model<ICategory>('Category', CategorySchema);
