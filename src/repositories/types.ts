import type { Cents } from '../lib/money.js';
import type {
  CartItemRecord,
  CategoryRecord,
  MenuItemRecord,
  MenuItemView,
  OrderItemRecord,
  OrderRecord,
  OrderStatus,
  Role,
  UserRecord,
} from '../types/domain.js';

export type SortDirection = 1 | -1;

export interface Page<T> {
  count: number;
  items: T[];
}

// ---- users ----

export interface NewUser {
  uid: string;
  username: string;
  email?: string;
  roles?: Role[];
}

export interface UserRepository {
  findById(id: number): Promise<UserRecord | null>;
  findByUid(uid: string): Promise<UserRecord | null>;
  findByUsername(username: string): Promise<UserRecord | null>;
  findAll(): Promise<UserRecord[]>;
  findByRole(role: Role): Promise<UserRecord[]>;
  create(input: NewUser): Promise<UserRecord>;
  addRole(id: number, role: Role): Promise<UserRecord | null>;
  removeRole(id: number, role: Role): Promise<UserRecord | null>;
}

// ---- catalog ----

export interface CategoryQuery {
  search?: string;
  titleDirection?: SortDirection;
}

export interface CategoryInput {
  slug: string;
  title: string;
}

export interface CategoryRepository {
  findAll(query?: CategoryQuery): Promise<CategoryRecord[]>;
  findById(id: number): Promise<CategoryRecord | null>;
  findBySlug(slug: string): Promise<CategoryRecord | null>;
  findByTitle(title: string): Promise<CategoryRecord | null>;
  create(input: CategoryInput): Promise<CategoryRecord>;
  update(id: number, patch: Partial<CategoryInput>): Promise<CategoryRecord | null>;
}

export type MenuSortField = 'price' | 'title' | 'categoryTitle';

export interface MenuSort {
  field: MenuSortField;
  direction: SortDirection;
}

export interface MenuItemQuery {
  search?: string;
  categoryTitle?: string;
  title?: string;
  sort: MenuSort[];
  offset: number;
  limit: number;
}

export interface MenuItemInput {
  title: string;
  priceCents: Cents;
  featured: boolean;
  categoryId: number;
}

export interface MenuItemRepository {
  findPage(query: MenuItemQuery): Promise<Page<MenuItemView>>;
  findById(id: number): Promise<MenuItemView | null>;
  findByIds(ids: readonly number[]): Promise<MenuItemRecord[]>;
  findByTitle(title: string): Promise<MenuItemRecord | null>;
  create(input: MenuItemInput): Promise<MenuItemView>;
  update(id: number, patch: Partial<MenuItemInput>): Promise<MenuItemView | null>;
  delete(id: number): Promise<boolean>;
}

// ---- cart ----

export interface NewCartItem {
  userId: number;
  menuItemId: number;
  quantity: number;
  unitPriceCents: Cents;
  priceCents: Cents;
}

export interface CartRepository {
  findForUser(userId: number): Promise<CartItemRecord[]>;
  findLine(userId: number, menuItemId: number): Promise<CartItemRecord | null>;
  /** Rejects with DuplicateEntryError when the (user, menu item) line already exists. */
  insert(input: NewCartItem): Promise<CartItemRecord>;
  updateQuantity(id: number, quantity: number, priceCents: Cents): Promise<CartItemRecord | null>;
  deleteForUser(userId: number, id: number): Promise<boolean>;
  clearForUser(userId: number): Promise<number>;
  deleteByMenuItem(menuItemId: number): Promise<number>;
}

// ---- orders ----

export interface NewOrder {
  userId: number;
  totalCents: Cents;
  createdAt: Date;
  items: Omit<OrderItemRecord, 'id'>[];
}

export interface OrderFilter {
  userId?: number;
  deliveryCrewId?: number;
  status?: OrderStatus;
}

export type OrderSortField = 'id' | 'total' | 'created';

export interface OrderSort {
  field: OrderSortField;
  direction: SortDirection;
}

export interface OrderChanges {
  deliveryCrewId?: number;
  status?: OrderStatus;
}

export interface OrderRepository {
  findById(id: number): Promise<OrderRecord | null>;
  findForUser(userId: number, sort?: OrderSort): Promise<OrderRecord[]>;
  findForDeliveryCrew(crewId: number, sort?: OrderSort): Promise<OrderRecord[]>;
  findAll(filter?: OrderFilter, sort?: OrderSort): Promise<OrderRecord[]>;
  create(input: NewOrder): Promise<OrderRecord>;
  update(id: number, changes: OrderChanges): Promise<OrderRecord | null>;
}

// ---- unit of work ----

export interface Repositories {
  users: UserRepository;
  categories: CategoryRepository;
  menuItems: MenuItemRepository;
  cart: CartRepository;
  orders: OrderRepository;
}

export interface Store extends Repositories {
  /**
   * Runs `work` against repositories bound to one transaction. Either every
   * write made through `tx` becomes visible or none does.
   */
  transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T>;
}
