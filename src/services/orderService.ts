import { NotFoundError, ValidationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { OrderChanges, OrderSort, Store } from '../repositories/types.js';
import { ORDER_STATUS, OrderRecord, OrderStatus, Principal } from '../types/domain.js';
import { convertCartToOrder } from './orderConverter.js';
import { OrderPatch, authorizeOrderUpdate, canView, orderScope } from './orderPolicy.js';
import type { RoleService } from './roles.js';

export interface OrderListOptions {
  /** Manager-only filters; ignored for everyone else. */
  status?: OrderStatus;
  userId?: number;
  sort?: OrderSort;
}

export type Clock = () => Date;

export class OrderService {
  constructor(
    private readonly store: Store,
    private readonly roles: RoleService,
    private readonly clock: Clock = () => new Date()
  ) {}

  async list(principal: Principal, options: OrderListOptions = {}): Promise<OrderRecord[]> {
    const scope = orderScope(principal);
    switch (scope.kind) {
      case 'all':
        return this.store.orders.findAll({ status: options.status, userId: options.userId }, options.sort);
      case 'assigned':
        return this.store.orders.findForDeliveryCrew(scope.crewId, options.sort);
      case 'owned':
        return this.store.orders.findForUser(scope.userId, options.sort);
    }
  }

  /** Out-of-scope orders are reported exactly like missing ones. */
  async retrieve(principal: Principal, orderId: number): Promise<OrderRecord> {
    const order = await this.store.orders.findById(orderId);
    if (!order || !canView(principal, order)) throw new NotFoundError('Order not found');
    return order;
  }

  async create(principal: Principal): Promise<OrderRecord> {
    const order = await this.store.transaction((tx) => convertCartToOrder(tx, principal.id, this.clock()));
    logger.info(
      { userId: principal.id, orderId: order.id, items: order.items.length, totalCents: order.totalCents },
      'Order created from cart'
    );
    return order;
  }

  async update(principal: Principal, orderId: number, patch: OrderPatch): Promise<OrderRecord> {
    const { order, actor, changes } = await this.store.transaction(async (tx) => {
      const current = await tx.orders.findById(orderId);
      if (!current) throw new NotFoundError('Order not found');

      const actor = authorizeOrderUpdate(principal, current, patch);

      if (patch.deliveryCrewId !== undefined) {
        const isCrew = await this.roles.hasRole(patch.deliveryCrewId, 'delivery-crew');
        if (!isCrew) {
          throw ValidationError.field(
            'delivery_crew',
            `User with id '${patch.deliveryCrewId}' is not a member of the Delivery Crew group.`
          );
        }
      }

      const changes: OrderChanges = {};
      if (patch.deliveryCrewId !== undefined) changes.deliveryCrewId = patch.deliveryCrewId;
      if (patch.status !== undefined) changes.status = patch.status;

      const updated = await tx.orders.update(orderId, changes);
      if (!updated) throw new NotFoundError('Order not found');
      return { order: updated, actor, changes };
    });

    logger.info({ orderId, actor, actorId: principal.id, changes }, `Order updated by ${actor}`);
    return order;
  }
}

export function statusFromName(name: unknown): OrderStatus | undefined {
  if (name === 'pending') return ORDER_STATUS.pending;
  if (name === 'delivered') return ORDER_STATUS.delivered;
  return undefined;
}
