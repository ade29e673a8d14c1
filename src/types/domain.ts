import type { Cents } from '../lib/money.js';

export const ROLES = ['customer', 'delivery-crew', 'manager', 'staff'] as const;
export type Role = (typeof ROLES)[number];

/** Roles that are granted through group membership. */
export type GroupRole = Extract<Role, 'manager' | 'delivery-crew'>;

export interface UserRecord {
  id: number;
  uid?: string;
  username: string;
  email?: string;
  roles: Role[];
  createdAt: Date;
}

/** The authenticated caller as seen by the services. */
export interface Principal {
  id: number;
  uid: string;
  username: string;
  roles: ReadonlySet<Role>;
}

export interface CategoryRecord {
  id: number;
  slug: string;
  title: string;
}

export interface MenuItemRecord {
  id: number;
  title: string;
  priceCents: Cents;
  featured: boolean;
  categoryId: number;
}

export interface MenuItemView extends MenuItemRecord {
  category: CategoryRecord;
}

export interface CartItemRecord {
  id: number;
  userId: number;
  menuItemId: number;
  quantity: number;
  unitPriceCents: Cents;
  priceCents: Cents;
  createdAt: Date;
}

export const ORDER_STATUS = {
  pending: 0,
  delivered: 1,
} as const;

export type OrderStatus = (typeof ORDER_STATUS)[keyof typeof ORDER_STATUS];
export type OrderStatusName = keyof typeof ORDER_STATUS;

export interface OrderItemRecord {
  id: number;
  menuItemId: number;
  menuItemTitle: string;
  quantity: number;
  unitPriceCents: Cents;
  priceCents: Cents;
}

export interface OrderRecord {
  id: number;
  userId: number;
  deliveryCrewId: number | null;
  status: OrderStatus;
  totalCents: Cents;
  createdAt: Date;
  items: OrderItemRecord[];
}
