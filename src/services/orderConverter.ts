import { ValidationError } from '../lib/errors.js';
import { MAX_AMOUNT_CENTS, formatAmount, sumAmounts } from '../lib/money.js';
import type { Repositories } from '../repositories/types.js';
import type { OrderRecord } from '../types/domain.js';

/**
 * Turns every cart line of `userId` into an order and empties the cart.
 *
 * Must run inside a transaction (`tx`): the order, its items and the cart
 * deletion become visible together or not at all. Cart prices are copied as
 * they are; menu prices are not consulted again.
 */
export async function convertCartToOrder(tx: Repositories, userId: number, createdAt: Date): Promise<OrderRecord> {
  const lines = await tx.cart.findForUser(userId);
  if (!lines.length) {
    throw ValidationError.field('cart', 'Cannot create order from empty cart.');
  }

  const totalCents = sumAmounts(lines.map((l) => l.priceCents));
  if (totalCents > MAX_AMOUNT_CENTS) {
    throw ValidationError.field(
      'cart',
      `Order total (${formatAmount(totalCents)}) would exceed maximum allowed value of ${formatAmount(MAX_AMOUNT_CENTS)}.`
    );
  }

  const menuItems = await tx.menuItems.findByIds([...new Set(lines.map((l) => l.menuItemId))]);
  const titles = new Map(menuItems.map((m) => [m.id, m.title]));

  const order = await tx.orders.create({
    userId,
    totalCents,
    createdAt,
    items: lines.map((line) => ({
      menuItemId: line.menuItemId,
      menuItemTitle: titles.get(line.menuItemId) ?? `Menu item ${line.menuItemId}`,
      quantity: line.quantity,
      unitPriceCents: line.unitPriceCents,
      priceCents: line.priceCents,
    })),
  });

  await tx.cart.clearForUser(userId);
  return order;
}
