import { AuthorizationError, DuplicateEntryError, NotFoundError, ValidationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type {
  CategoryInput,
  CategoryQuery,
  MenuItemInput,
  MenuItemQuery,
  Page,
  Store,
} from '../repositories/types.js';
import type { CategoryRecord, MenuItemView } from '../types/domain.js';

export class CategoryService {
  constructor(private readonly store: Store) {}

  list(query: CategoryQuery = {}): Promise<CategoryRecord[]> {
    return this.store.categories.findAll(query);
  }

  async retrieve(id: number): Promise<CategoryRecord> {
    const category = await this.store.categories.findById(id);
    if (!category) throw new NotFoundError('Category not found');
    return category;
  }

  async create(input: CategoryInput): Promise<CategoryRecord> {
    await this.assertUnique(input);
    return this.settleDuplicate(() => this.store.categories.create(input), input);
  }

  async update(id: number, patch: Partial<CategoryInput>): Promise<CategoryRecord> {
    await this.retrieve(id);
    await this.assertUnique(patch, id);
    const updated = await this.settleDuplicate(() => this.store.categories.update(id, patch), patch, id);
    if (!updated) throw new NotFoundError('Category not found');
    return updated;
  }

  /** Categories are referenced by menu items and order history. */
  remove(): never {
    throw new AuthorizationError('Deleting categories is not allowed.');
  }

  /** A concurrent write can take a slug or title between the check and the write. */
  private async settleDuplicate<T>(write: () => Promise<T>, input: Partial<CategoryInput>, selfId?: number): Promise<T> {
    try {
      return await write();
    } catch (err) {
      if (err instanceof DuplicateEntryError) await this.assertUnique(input, selfId);
      throw err;
    }
  }

  private async assertUnique(input: Partial<CategoryInput>, selfId?: number): Promise<void> {
    const fields: Record<string, string[]> = {};
    if (input.slug !== undefined) {
      const clash = await this.store.categories.findBySlug(input.slug);
      if (clash && clash.id !== selfId) fields.slug = ['category with this slug already exists.'];
    }
    if (input.title !== undefined) {
      const clash = await this.store.categories.findByTitle(input.title);
      if (clash && clash.id !== selfId) fields.title = ['category with this title already exists.'];
    }
    if (Object.keys(fields).length) throw new ValidationError(fields);
  }
}

export class MenuItemService {
  constructor(private readonly store: Store) {}

  list(query: MenuItemQuery): Promise<Page<MenuItemView>> {
    return this.store.menuItems.findPage(query);
  }

  async retrieve(id: number): Promise<MenuItemView> {
    const item = await this.store.menuItems.findById(id);
    if (!item) throw new NotFoundError('Menu item not found');
    return item;
  }

  async create(input: MenuItemInput): Promise<MenuItemView> {
    await this.assertValidRefs(input);
    return this.settleDuplicate(() => this.store.menuItems.create(input), input);
  }

  async update(id: number, patch: Partial<MenuItemInput>): Promise<MenuItemView> {
    await this.retrieve(id);
    await this.assertValidRefs(patch, id);
    const updated = await this.settleDuplicate(() => this.store.menuItems.update(id, patch), patch, id);
    if (!updated) throw new NotFoundError('Menu item not found');
    return updated;
  }

  /** Removes the item and every cart line pointing at it. Order snapshots keep their copy. */
  async remove(id: number): Promise<void> {
    const removedLines = await this.store.transaction(async (tx) => {
      const lines = await tx.cart.deleteByMenuItem(id);
      const deleted = await tx.menuItems.delete(id);
      if (!deleted) throw new NotFoundError('Menu item not found');
      return lines;
    });
    logger.info({ menuItemId: id, removedLines }, 'Menu item deleted');
  }

  private async settleDuplicate<T>(write: () => Promise<T>, input: Partial<MenuItemInput>, selfId?: number): Promise<T> {
    try {
      return await write();
    } catch (err) {
      if (err instanceof DuplicateEntryError) await this.assertValidRefs(input, selfId);
      throw err;
    }
  }

  private async assertValidRefs(input: Partial<MenuItemInput>, selfId?: number): Promise<void> {
    const fields: Record<string, string[]> = {};
    if (input.title !== undefined) {
      const clash = await this.store.menuItems.findByTitle(input.title);
      if (clash && clash.id !== selfId) fields.title = ['menu item with this title already exists.'];
    }
    if (input.categoryId !== undefined) {
      const category = await this.store.categories.findById(input.categoryId);
      if (!category) fields.category_id = [`Invalid pk "${input.categoryId}" - object does not exist.`];
    }
    if (Object.keys(fields).length) throw new ValidationError(fields);
  }
}
