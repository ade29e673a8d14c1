import { DuplicateEntryError, NotFoundError, ValidationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { Cents, MAX_AMOUNT_CENTS, MAX_QUANTITY, formatAmount, lineTotal } from '../lib/money.js';
import type { Repositories, Store } from '../repositories/types.js';
import type { CartItemRecord, Principal } from '../types/domain.js';

export interface CartLine extends CartItemRecord {
  menuItemTitle: string;
}

export interface AddToCartInput {
  menuItemId: number;
  quantity: number;
}

/**
 * Rejects a line whose merged quantity or price would not fit the storage
 * columns. Quantity is checked first.
 */
export function assertLineFits(unitPriceCents: Cents, quantity: number): Cents {
  if (quantity > MAX_QUANTITY) {
    throw ValidationError.field('quantity', 'Quantity cannot exceed 32,767.');
  }
  const total = lineTotal(unitPriceCents, quantity);
  if (total > MAX_AMOUNT_CENTS) {
    throw ValidationError.field(
      'quantity',
      `Total price (${formatAmount(total)}) would exceed maximum allowed value of ${formatAmount(MAX_AMOUNT_CENTS)}. Please reduce quantity.`
    );
  }
  return total;
}

export class CartService {
  constructor(private readonly store: Store) {}

  async list(principal: Principal): Promise<CartLine[]> {
    const items = await this.store.cart.findForUser(principal.id);
    return this.withTitles(this.store, items);
  }

  /**
   * Adds `quantity` of a menu item, merging into the caller's existing line.
   * The read, the overflow check and the write share one transaction.
   */
  async add(principal: Principal, input: AddToCartInput): Promise<CartLine> {
    const attempt = () => this.store.transaction((tx) => this.merge(tx, principal.id, input));
    try {
      return await attempt();
    } catch (err) {
      // Two first-time adds raced on the unique (user, menu item) index; the retry sees the winner's row
      if (err instanceof DuplicateEntryError) {
        logger.debug({ userId: principal.id, menuItemId: input.menuItemId }, 'Retrying cart merge after insert race');
        return attempt();
      }
      throw err;
    }
  }

  async remove(principal: Principal, cartItemId: number): Promise<void> {
    const deleted = await this.store.cart.deleteForUser(principal.id, cartItemId);
    if (!deleted) throw new NotFoundError('Cart item not found');
  }

  async clear(principal: Principal): Promise<number> {
    return this.store.cart.clearForUser(principal.id);
  }

  private async merge(tx: Repositories, userId: number, input: AddToCartInput): Promise<CartLine> {
    const [menuItem] = await tx.menuItems.findByIds([input.menuItemId]);
    if (!menuItem) {
      throw ValidationError.field('menuitem', `Invalid pk "${input.menuItemId}" - object does not exist.`);
    }

    const existing = await tx.cart.findLine(userId, menuItem.id);
    if (!existing) {
      const priceCents = assertLineFits(menuItem.priceCents, input.quantity);
      const created = await tx.cart.insert({
        userId,
        menuItemId: menuItem.id,
        quantity: input.quantity,
        unitPriceCents: menuItem.priceCents,
        priceCents,
      });
      return { ...created, menuItemTitle: menuItem.title };
    }

    // The line keeps the unit price it was first added at
    const quantity = existing.quantity + input.quantity;
    const priceCents = assertLineFits(existing.unitPriceCents, quantity);
    const updated = await tx.cart.updateQuantity(existing.id, quantity, priceCents);
    if (!updated) throw new NotFoundError('Cart item not found');
    return { ...updated, menuItemTitle: menuItem.title };
  }

  private async withTitles(repos: Repositories, items: CartItemRecord[]): Promise<CartLine[]> {
    if (!items.length) return [];
    const menuItems = await repos.menuItems.findByIds([...new Set(items.map((i) => i.menuItemId))]);
    const titles = new Map(menuItems.map((m) => [m.id, m.title]));
    return items.map((item) => ({ ...item, menuItemTitle: titles.get(item.menuItemId) ?? '' }));
  }
}
