import mongoose, { Model, Schema } from 'mongoose';
import { MAX_AMOUNT_CENTS, MAX_QUANTITY } from '../lib/money.js';

export interface ICartItem {
  _id: number;
  user: number;
  menuItem: number;
  quantity: number;
  unitPrice: number; // cents
  price: number; // cents
  createdAt: Date;
}

const CartItemSchema = new Schema<ICartItem>(
  {
    _id: { type: Number, required: true },
    user: { type: Number, ref: 'User', required: true, index: true },
    menuItem: { type: Number, ref: 'MenuItem', required: true },
    quantity: { type: Number, required: true, min: 1, max: MAX_QUANTITY },
    unitPrice: { type: Number, required: true, min: 0, max: MAX_AMOUNT_CENTS },
    price: { type: Number, required: true, min: 0, max: MAX_AMOUNT_CENTS },
    createdAt: { type: Date, required: true, default: Date.now },
  },
  { versionKey: false }
);

// One line per menu item per user; repeated adds merge into it
CartItemSchema.index({ user: 1, menuItem: 1 }, { unique: true });

export const CartItem: Model<ICartItem> = mongoose.model<ICartItem>('CartItem', CartItemSchema);
