// src/models/menuItem.ts
import mongoose, { Schema, Model } from 'mongoose';
import { MAX_AMOUNT_CENTS } from '../lib/money.js';

export interface IMenuItem {
  _id: number;
  title: string;
  price: number; // cents
  featured: boolean;
  category: number;
}

const MenuItemSchema = new Schema<IMenuItem>(
  {
    _id: { type: Number, required: true },
    title: { type: String, required: true, unique: true, maxlength: 255 },
    price: { type: Number, required: true, min: 0, max: MAX_AMOUNT_CENTS },
    featured: { type: Boolean, default: false, index: true },
    category: { type: Number, ref: 'Category', required: true, index: true },
  },
  { timestamps: true, versionKey: false }
);

export const MenuItem: Model<IMenuItem> = mongoose.model<IMenuItem>('MenuItem', MenuItemSchema);
