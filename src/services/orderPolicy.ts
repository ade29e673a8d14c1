import { AuthorizationError, MethodNotAllowedError, ValidationError } from '../lib/errors.js';
import { ORDER_STATUS, OrderRecord, OrderStatus, Principal } from '../types/domain.js';
import { isDeliveryCrew, isManager } from './roles.js';

/**
 * Authorization state machine for orders.
 *
 *   unassigned ──(manager sets crew)──▶ assigned ──(manager or assigned crew delivers)──▶ delivered
 *
 * A manager may also assign and deliver in a single request. `delivered` is terminal.
 */

export type OrderState = 'unassigned' | 'assigned' | 'delivered';
export type OrderAction = 'assign-crew' | 'mark-delivered';
export type OrderActor = 'manager' | 'assigned-crew' | 'delivery-crew' | 'customer';

/**
 * allow      - permitted
 * forbid     - the actor may never do this here (403)
 * needs-crew - permitted only if a crew is assigned in the same request (400 otherwise)
 * terminal   - the actor could, but the order is delivered (405)
 */
export type Verdict = 'allow' | 'forbid' | 'needs-crew' | 'terminal';

export const ORDER_STATES: readonly OrderState[] = ['unassigned', 'assigned', 'delivered'];
export const ORDER_ACTIONS: readonly OrderAction[] = ['assign-crew', 'mark-delivered'];
export const ORDER_ACTORS: readonly OrderActor[] = ['manager', 'assigned-crew', 'delivery-crew', 'customer'];

export const ORDER_TRANSITIONS: Readonly<Record<OrderState, Record<OrderAction, Record<OrderActor, Verdict>>>> = {
  unassigned: {
    'assign-crew': { manager: 'allow', 'assigned-crew': 'forbid', 'delivery-crew': 'forbid', customer: 'forbid' },
    'mark-delivered': { manager: 'needs-crew', 'assigned-crew': 'forbid', 'delivery-crew': 'forbid', customer: 'forbid' },
  },
  assigned: {
    'assign-crew': { manager: 'allow', 'assigned-crew': 'forbid', 'delivery-crew': 'forbid', customer: 'forbid' },
    'mark-delivered': { manager: 'allow', 'assigned-crew': 'allow', 'delivery-crew': 'forbid', customer: 'forbid' },
  },
  delivered: {
    'assign-crew': { manager: 'terminal', 'assigned-crew': 'forbid', 'delivery-crew': 'forbid', customer: 'forbid' },
    'mark-delivered': { manager: 'terminal', 'assigned-crew': 'terminal', 'delivery-crew': 'forbid', customer: 'forbid' },
  },
};

const FORBIDDEN_MESSAGES: Record<OrderAction, string> = {
  'assign-crew': 'Only managers can assign a delivery crew to an order.',
  'mark-delivered': 'Only a manager or the assigned delivery crew can mark this order as delivered.',
};

export interface OrderPatch {
  deliveryCrewId?: number;
  status?: OrderStatus;
}

export type OrderScope =
  | { kind: 'all' }
  | { kind: 'assigned'; crewId: number }
  | { kind: 'owned'; userId: number };

export function orderState(order: Pick<OrderRecord, 'status' | 'deliveryCrewId'>): OrderState {
  if (order.status === ORDER_STATUS.delivered) return 'delivered';
  return order.deliveryCrewId === null ? 'unassigned' : 'assigned';
}

/** Manager membership wins over delivery-crew membership. */
export function actorFor(principal: Principal, order: Pick<OrderRecord, 'deliveryCrewId'>): OrderActor {
  if (isManager(principal)) return 'manager';
  if (isDeliveryCrew(principal)) {
    return order.deliveryCrewId === principal.id ? 'assigned-crew' : 'delivery-crew';
  }
  return 'customer';
}

export function orderScope(principal: Principal): OrderScope {
  if (isManager(principal)) return { kind: 'all' };
  if (isDeliveryCrew(principal)) return { kind: 'assigned', crewId: principal.id };
  return { kind: 'owned', userId: principal.id };
}

export function canView(principal: Principal, order: Pick<OrderRecord, 'userId' | 'deliveryCrewId'>): boolean {
  const scope = orderScope(principal);
  switch (scope.kind) {
    case 'all':
      return true;
    case 'assigned':
      return order.deliveryCrewId === scope.crewId;
    case 'owned':
      return order.userId === scope.userId;
  }
}

export function requestedActions(patch: OrderPatch): OrderAction[] {
  const actions: OrderAction[] = [];
  if (patch.deliveryCrewId !== undefined) actions.push('assign-crew');
  if (patch.status !== undefined) actions.push('mark-delivered');
  return actions;
}

/**
 * Checks a partial update against the transition table. Returns the acting
 * role on success; throws 403, then 405, then 400 in that order of precedence.
 */
export function authorizeOrderUpdate(principal: Principal, order: OrderRecord, patch: OrderPatch): OrderActor {
  const actor = actorFor(principal, order);
  const state = orderState(order);
  const actions = requestedActions(patch);
  const verdicts = actions.map((action) => ({ action, verdict: ORDER_TRANSITIONS[state][action][actor] }));

  const forbidden = verdicts.find((v) => v.verdict === 'forbid');
  if (forbidden) throw new AuthorizationError(FORBIDDEN_MESSAGES[forbidden.action]);

  if (verdicts.some((v) => v.verdict === 'terminal')) {
    throw new MethodNotAllowedError('PATCH', ['GET'], `Order ${order.id} has already been delivered and can no longer be modified.`);
  }

  const assigningNow = actions.includes('assign-crew');
  if (verdicts.some((v) => v.verdict === 'needs-crew') && !assigningNow) {
    throw ValidationError.field('status', 'Cannot mark an order as delivered before a delivery crew is assigned.');
  }

  return actor;
}
