import { formatAmount } from '../lib/money.js';
import type {
  CartItemRecord,
  CategoryRecord,
  MenuItemView,
  OrderItemRecord,
  OrderRecord,
  UserRecord,
} from '../types/domain.js';

// Wire representations. Money leaves as fixed two-decimal strings.

export interface CartItemDto {
  id: number;
  menuitem: number;
  menuitem_title: string;
  quantity: number;
  unit_price: string;
  price: string;
}

export interface OrderItemDto {
  id: number;
  menuitem: number;
  menuitem_title: string;
  quantity: number;
  unit_price: string;
  price: string;
}

export interface OrderDto {
  id: number;
  user: number;
  delivery_crew: number | null;
  status: number;
  total: string;
  created: string;
  order_items: OrderItemDto[];
}

export interface CategoryDto {
  id: number;
  slug: string;
  title: string;
}

export interface MenuItemDto {
  id: number;
  title: string;
  price: string;
  featured: boolean;
  category: CategoryDto;
}

export interface UserDto {
  id: number;
  username: string;
  email: string | null;
  roles: string[];
}

export function serializeCartItem(item: CartItemRecord, title: string): CartItemDto {
  return {
    id: item.id,
    menuitem: item.menuItemId,
    menuitem_title: title,
    quantity: item.quantity,
    unit_price: formatAmount(item.unitPriceCents),
    price: formatAmount(item.priceCents),
  };
}

function serializeOrderItem(item: OrderItemRecord): OrderItemDto {
  return {
    id: item.id,
    menuitem: item.menuItemId,
    menuitem_title: item.menuItemTitle,
    quantity: item.quantity,
    unit_price: formatAmount(item.unitPriceCents),
    price: formatAmount(item.priceCents),
  };
}

export function serializeOrder(order: OrderRecord): OrderDto {
  return {
    id: order.id,
    user: order.userId,
    delivery_crew: order.deliveryCrewId,
    status: order.status,
    total: formatAmount(order.totalCents),
    created: order.createdAt.toISOString(),
    order_items: order.items.map(serializeOrderItem),
  };
}

export function serializeCategory(category: CategoryRecord): CategoryDto {
  return { id: category.id, slug: category.slug, title: category.title };
}

export function serializeMenuItem(item: MenuItemView): MenuItemDto {
  return {
    id: item.id,
    title: item.title,
    price: formatAmount(item.priceCents),
    featured: item.featured,
    category: serializeCategory(item.category),
  };
}

export function serializeUser(user: UserRecord): UserDto {
  return {
    id: user.id,
    username: user.username,
    email: user.email ?? null,
    roles: [...user.roles],
  };
}
