import mongoose, { ClientSession, Connection, PipelineStage } from 'mongoose';
import { DuplicateEntryError } from '../lib/errors.js';
import { CartItem, ICartItem } from '../models/cartItem.js';
import { Category, ICategory } from '../models/category.js';
import { nextSequence } from '../models/counter.js';
import { IMenuItem, MenuItem } from '../models/menuItem.js';
import { IOrder, IOrderItem, Order } from '../models/order.js';
import { IUser, User } from '../models/user.js';
import type {
  CartItemRecord,
  CategoryRecord,
  MenuItemRecord,
  MenuItemView,
  OrderRecord,
  Role,
  UserRecord,
} from '../types/domain.js';
import { escapeRegex } from '../utils/text.js';
import type {
  CartRepository,
  CategoryInput,
  CategoryQuery,
  CategoryRepository,
  MenuItemInput,
  MenuItemQuery,
  MenuItemRepository,
  MenuSortField,
  NewCartItem,
  NewOrder,
  NewUser,
  OrderChanges,
  OrderFilter,
  OrderRepository,
  OrderSort,
  OrderSortField,
  Page,
  Repositories,
  Store,
  UserRepository,
} from './types.js';

export function isDuplicateKeyError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 11000;
}

// ---- document → record mappers ----

export function toUserRecord(doc: IUser): UserRecord {
  return {
    id: doc._id,
    uid: doc.uid,
    username: doc.username,
    email: doc.email,
    roles: [...doc.roles],
    createdAt: doc.createdAt,
  };
}

export function toCategoryRecord(doc: ICategory): CategoryRecord {
  return { id: doc._id, slug: doc.slug, title: doc.title };
}

export function toMenuItemRecord(doc: IMenuItem): MenuItemRecord {
  return {
    id: doc._id,
    title: doc.title,
    priceCents: doc.price,
    featured: doc.featured,
    categoryId: doc.category,
  };
}

export function toCartItemRecord(doc: ICartItem): CartItemRecord {
  return {
    id: doc._id,
    userId: doc.user,
    menuItemId: doc.menuItem,
    quantity: doc.quantity,
    unitPriceCents: doc.unitPrice,
    priceCents: doc.price,
    createdAt: doc.createdAt,
  };
}

export function toOrderRecord(doc: IOrder): OrderRecord {
  return {
    id: doc._id,
    userId: doc.user,
    deliveryCrewId: doc.deliveryCrew ?? null,
    status: doc.status,
    totalCents: doc.total,
    createdAt: doc.createdAt,
    items: doc.items.map((item) => ({
      id: item._id,
      menuItemId: item.menuItem,
      menuItemTitle: item.title,
      quantity: item.quantity,
      unitPriceCents: item.unitPrice,
      priceCents: item.price,
    })),
  };
}

// ---- repositories ----

class MongoUserRepository implements UserRepository {
  constructor(private readonly session?: ClientSession) {}

  async findById(id: number) {
    const doc = await User.findById(id, null, { session: this.session }).lean<IUser>();
    return doc ? toUserRecord(doc) : null;
  }

  async findByUid(uid: string) {
    const doc = await User.findOne({ uid }, null, { session: this.session }).lean<IUser>();
    return doc ? toUserRecord(doc) : null;
  }

  async findByUsername(username: string) {
    const doc = await User.findOne({ username }, null, { session: this.session }).lean<IUser>();
    return doc ? toUserRecord(doc) : null;
  }

  async findAll() {
    const docs = await User.find({}, null, { session: this.session }).sort({ _id: 1 }).lean<IUser[]>();
    return docs.map(toUserRecord);
  }

  async findByRole(role: Role) {
    const docs = await User.find({ roles: role }, null, { session: this.session })
      .sort({ _id: 1 })
      .lean<IUser[]>();
    return docs.map(toUserRecord);
  }

  async create(input: NewUser) {
    const id = await nextSequence('users', this.session);
    try {
      const [doc] = await User.create(
        [{ _id: id, uid: input.uid, username: input.username, email: input.email, roles: input.roles ?? ['customer'] }],
        { session: this.session }
      );
      return toUserRecord(doc.toObject());
    } catch (err) {
      if (isDuplicateKeyError(err)) throw new DuplicateEntryError('user');
      throw err;
    }
  }

  async addRole(id: number, role: Role) {
    const doc = await User.findByIdAndUpdate(
      id,
      { $addToSet: { roles: role } },
      { new: true, session: this.session }
    ).lean<IUser>();
    return doc ? toUserRecord(doc) : null;
  }

  async removeRole(id: number, role: Role) {
    const doc = await User.findByIdAndUpdate(
      id,
      { $pull: { roles: role } },
      { new: true, session: this.session }
    ).lean<IUser>();
    return doc ? toUserRecord(doc) : null;
  }
}

class MongoCategoryRepository implements CategoryRepository {
  constructor(private readonly session?: ClientSession) {}

  async findAll(query: CategoryQuery = {}) {
    const filter = query.search ? { title: { $regex: escapeRegex(query.search), $options: 'i' } } : {};
    const sort: Record<string, 1 | -1> = query.titleDirection
      ? { title: query.titleDirection, _id: 1 }
      : { _id: 1 };
    const docs = await Category.find(filter, null, { session: this.session }).sort(sort).lean<ICategory[]>();
    return docs.map(toCategoryRecord);
  }

  async findById(id: number) {
    const doc = await Category.findById(id, null, { session: this.session }).lean<ICategory>();
    return doc ? toCategoryRecord(doc) : null;
  }

  async findBySlug(slug: string) {
    const doc = await Category.findOne({ slug }, null, { session: this.session }).lean<ICategory>();
    return doc ? toCategoryRecord(doc) : null;
  }

  async findByTitle(title: string) {
    const doc = await Category.findOne({ title }, null, { session: this.session }).lean<ICategory>();
    return doc ? toCategoryRecord(doc) : null;
  }

  async create(input: CategoryInput) {
    const id = await nextSequence('categories', this.session);
    try {
      await Category.create([{ _id: id, slug: input.slug, title: input.title }], { session: this.session });
    } catch (err) {
      if (isDuplicateKeyError(err)) throw new DuplicateEntryError('category');
      throw err;
    }
    return { id, slug: input.slug, title: input.title };
  }

  async update(id: number, patch: Partial<CategoryInput>) {
    try {
      const doc = await Category.findByIdAndUpdate(id, { $set: patch }, { new: true, session: this.session })
        .lean<ICategory>();
      return doc ? toCategoryRecord(doc) : null;
    } catch (err) {
      if (isDuplicateKeyError(err)) throw new DuplicateEntryError('category');
      throw err;
    }
  }
}

interface MenuItemJoined extends IMenuItem {
  categoryDoc: ICategory;
}

interface MenuPageFacet {
  total: { count: number }[];
  rows: MenuItemJoined[];
}

const MENU_SORT_PATHS: Record<MenuSortField, string> = {
  price: 'price',
  title: 'title',
  categoryTitle: 'categoryDoc.title',
};

function toMenuItemView(doc: MenuItemJoined): MenuItemView {
  return { ...toMenuItemRecord(doc), category: toCategoryRecord(doc.categoryDoc) };
}

class MongoMenuItemRepository implements MenuItemRepository {
  constructor(private readonly session?: ClientSession) {}

  private joinCategory(): PipelineStage[] {
    return [
      {
        $lookup: {
          from: Category.collection.collectionName,
          localField: 'category',
          foreignField: '_id',
          as: 'categoryDoc',
        },
      },
      { $unwind: '$categoryDoc' },
    ];
  }

  async findPage(query: MenuItemQuery): Promise<Page<MenuItemView>> {
    const match: Record<string, unknown> = {};
    if (query.search) match.title = { $regex: escapeRegex(query.search), $options: 'i' };
    if (query.title !== undefined) match.title = query.title;
    if (query.categoryTitle) {
      match['categoryDoc.title'] = { $regex: escapeRegex(query.categoryTitle), $options: 'i' };
    }
    const sort: Record<string, 1 | -1> = {};
    for (const s of query.sort) sort[MENU_SORT_PATHS[s.field]] = s.direction;
    sort._id = 1;

    const [facet] = await MenuItem.aggregate<MenuPageFacet>([
      ...this.joinCategory(),
      { $match: match },
      { $sort: sort },
      {
        $facet: {
          total: [{ $count: 'count' }],
          rows: [{ $skip: query.offset }, { $limit: query.limit }],
        },
      },
    ]).session(this.session ?? null);

    return {
      count: facet?.total[0]?.count ?? 0,
      items: (facet?.rows ?? []).map(toMenuItemView),
    };
  }

  async findById(id: number) {
    const [doc] = await MenuItem.aggregate<MenuItemJoined>([
      { $match: { _id: id } },
      ...this.joinCategory(),
    ]).session(this.session ?? null);
    return doc ? toMenuItemView(doc) : null;
  }

  async findByIds(ids: readonly number[]) {
    const docs = await MenuItem.find({ _id: { $in: [...ids] } }, null, { session: this.session })
      .lean<IMenuItem[]>();
    return docs.map(toMenuItemRecord);
  }

  async findByTitle(title: string) {
    const doc = await MenuItem.findOne({ title }, null, { session: this.session }).lean<IMenuItem>();
    return doc ? toMenuItemRecord(doc) : null;
  }

  async create(input: MenuItemInput) {
    const id = await nextSequence('menuItems', this.session);
    try {
      await MenuItem.create(
        [{ _id: id, title: input.title, price: input.priceCents, featured: input.featured, category: input.categoryId }],
        { session: this.session }
      );
    } catch (err) {
      if (isDuplicateKeyError(err)) throw new DuplicateEntryError('menuItem');
      throw err;
    }
    const created = await this.findById(id);
    if (!created) throw new Error(`Menu item ${id} vanished after insert`);
    return created;
  }

  async update(id: number, patch: Partial<MenuItemInput>) {
    const set: Partial<IMenuItem> = {};
    if (patch.title !== undefined) set.title = patch.title;
    if (patch.priceCents !== undefined) set.price = patch.priceCents;
    if (patch.featured !== undefined) set.featured = patch.featured;
    if (patch.categoryId !== undefined) set.category = patch.categoryId;
    try {
      const updated = await MenuItem.updateOne({ _id: id }, { $set: set }, { session: this.session });
      if (updated.matchedCount === 0) return null;
    } catch (err) {
      if (isDuplicateKeyError(err)) throw new DuplicateEntryError('menuItem');
      throw err;
    }
    return this.findById(id);
  }

  async delete(id: number) {
    const result = await MenuItem.deleteOne({ _id: id }, { session: this.session });
    return result.deletedCount > 0;
  }
}

class MongoCartRepository implements CartRepository {
  constructor(private readonly session?: ClientSession) {}

  async findForUser(userId: number) {
    const docs = await CartItem.find({ user: userId }, null, { session: this.session })
      .sort({ createdAt: 1, _id: 1 })
      .lean<ICartItem[]>();
    return docs.map(toCartItemRecord);
  }

  async findLine(userId: number, menuItemId: number) {
    const doc = await CartItem.findOne({ user: userId, menuItem: menuItemId }, null, { session: this.session })
      .lean<ICartItem>();
    return doc ? toCartItemRecord(doc) : null;
  }

  async insert(input: NewCartItem) {
    const id = await nextSequence('cartItems', this.session);
    const doc: ICartItem = {
      _id: id,
      user: input.userId,
      menuItem: input.menuItemId,
      quantity: input.quantity,
      unitPrice: input.unitPriceCents,
      price: input.priceCents,
      createdAt: new Date(),
    };
    try {
      await CartItem.create([doc], { session: this.session });
    } catch (err) {
      if (isDuplicateKeyError(err)) throw new DuplicateEntryError('cartItem');
      throw err;
    }
    return toCartItemRecord(doc);
  }

  async updateQuantity(id: number, quantity: number, priceCents: number) {
    const doc = await CartItem.findByIdAndUpdate(
      id,
      { $set: { quantity, price: priceCents } },
      { new: true, session: this.session }
    ).lean<ICartItem>();
    return doc ? toCartItemRecord(doc) : null;
  }

  async deleteForUser(userId: number, id: number) {
    const result = await CartItem.deleteOne({ _id: id, user: userId }, { session: this.session });
    return result.deletedCount > 0;
  }

  async clearForUser(userId: number) {
    const result = await CartItem.deleteMany({ user: userId }, { session: this.session });
    return result.deletedCount;
  }

  async deleteByMenuItem(menuItemId: number) {
    const result = await CartItem.deleteMany({ menuItem: menuItemId }, { session: this.session });
    return result.deletedCount;
  }
}

const ORDER_SORT_PATHS: Record<OrderSortField, string> = {
  id: '_id',
  total: 'total',
  created: 'createdAt',
};

function orderSort(sort?: OrderSort): Record<string, 1 | -1> {
  if (!sort) return { _id: 1 };
  return sort.field === 'id'
    ? { _id: sort.direction }
    : { [ORDER_SORT_PATHS[sort.field]]: sort.direction, _id: 1 };
}

class MongoOrderRepository implements OrderRepository {
  constructor(private readonly session?: ClientSession) {}

  async findById(id: number) {
    const doc = await Order.findById(id, null, { session: this.session }).lean<IOrder>();
    return doc ? toOrderRecord(doc) : null;
  }

  findForUser(userId: number, sort?: OrderSort) {
    return this.findAll({ userId }, sort);
  }

  findForDeliveryCrew(crewId: number, sort?: OrderSort) {
    return this.findAll({ deliveryCrewId: crewId }, sort);
  }

  async findAll(filter: OrderFilter = {}, sort?: OrderSort) {
    const query: Record<string, number> = {};
    if (filter.userId !== undefined) query.user = filter.userId;
    if (filter.deliveryCrewId !== undefined) query.deliveryCrew = filter.deliveryCrewId;
    if (filter.status !== undefined) query.status = filter.status;
    const docs = await Order.find(query, null, { session: this.session }).sort(orderSort(sort)).lean<IOrder[]>();
    return docs.map(toOrderRecord);
  }

  async create(input: NewOrder) {
    const id = await nextSequence('orders', this.session);
    const items: IOrderItem[] = [];
    for (const item of input.items) {
      items.push({
        _id: await nextSequence('orderItems', this.session),
        menuItem: item.menuItemId,
        title: item.menuItemTitle,
        quantity: item.quantity,
        unitPrice: item.unitPriceCents,
        price: item.priceCents,
      });
    }
    const doc: IOrder = {
      _id: id,
      user: input.userId,
      deliveryCrew: null,
      status: 0,
      total: input.totalCents,
      items,
      createdAt: input.createdAt,
    };
    await Order.create([doc], { session: this.session });
    return toOrderRecord(doc);
  }

  async update(id: number, changes: OrderChanges) {
    const set: Partial<Pick<IOrder, 'deliveryCrew' | 'status'>> = {};
    if (changes.deliveryCrewId !== undefined) set.deliveryCrew = changes.deliveryCrewId;
    if (changes.status !== undefined) set.status = changes.status;
    const doc = await Order.findByIdAndUpdate(id, { $set: set }, { new: true, session: this.session })
      .lean<IOrder>();
    return doc ? toOrderRecord(doc) : null;
  }
}

function repositories(session?: ClientSession): Repositories {
  return {
    users: new MongoUserRepository(session),
    categories: new MongoCategoryRepository(session),
    menuItems: new MongoMenuItemRepository(session),
    cart: new MongoCartRepository(session),
    orders: new MongoOrderRepository(session),
  };
}

/**
 * Repositories over the mongoose models. Transactions need a replica set
 * (or sharded cluster); `withTransaction` retries transient write conflicts.
 */
export class MongoStore implements Store {
  readonly users: UserRepository;
  readonly categories: CategoryRepository;
  readonly menuItems: MenuItemRepository;
  readonly cart: CartRepository;
  readonly orders: OrderRepository;

  constructor(private readonly connection: Connection = mongoose.connection) {
    const repos = repositories();
    this.users = repos.users;
    this.categories = repos.categories;
    this.menuItems = repos.menuItems;
    this.cart = repos.cart;
    this.orders = repos.orders;
  }

  async transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T> {
    const session = await this.connection.startSession();
    try {
      const results: T[] = [];
      await session.withTransaction(async () => {
        // withTransaction may run the callback again after a transient error
        results.length = 0;
        results.push(await work(repositories(session)));
      });
      if (results.length === 0) throw new Error('Transaction finished without a result');
      return results[0];
    } finally {
      await session.endSession();
    }
  }
}
