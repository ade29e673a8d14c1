// src/models/order.ts
import mongoose, { Model, Schema } from 'mongoose';
import { MAX_AMOUNT_CENTS } from '../lib/money.js';
import { ORDER_STATUS, OrderStatus } from '../types/domain.js';

export interface IOrderItem {
  _id: number;
  menuItem: number;
  title: string;
  quantity: number;
  unitPrice: number; // cents
  price: number; // cents
}

export interface IOrder {
  _id: number;
  user: number;
  deliveryCrew: number | null;
  status: OrderStatus;
  total: number; // cents
  items: IOrderItem[];
  createdAt: Date;
}

const OrderItemSchema = new Schema<IOrderItem>({
  _id: { type: Number, required: true },
  menuItem: { type: Number, ref: 'MenuItem', required: true },
  title: { type: String, required: true },
  quantity: { type: Number, required: true },
  unitPrice: { type: Number, required: true },
  price: { type: Number, required: true },
});

const OrderSchema = new Schema<IOrder>(
  {
    _id: { type: Number, required: true },
    user: { type: Number, ref: 'User', required: true, immutable: true, index: true },
    deliveryCrew: { type: Number, ref: 'User', default: null, index: true },
    status: {
      type: Number,
      enum: Object.values(ORDER_STATUS),
      default: ORDER_STATUS.pending,
      index: true,
    },
    total: { type: Number, required: true, min: 0, max: MAX_AMOUNT_CENTS, immutable: true },
    items: { type: [OrderItemSchema], required: true, immutable: true },
    createdAt: { type: Date, required: true, immutable: true },
  },
  { versionKey: false }
);

export const Order: Model<IOrder> = mongoose.model<IOrder>('Order', OrderSchema);
