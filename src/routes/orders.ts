import { Router } from 'express';
import { requirePrincipal } from '../middleware/auth.js';
import { methodNotAllowed } from '../middleware/errorHandler.js';
import { parseWith, requirePathId } from '../lib/validation.js';
import { updateOrderBody } from '../schemas/orders.js';
import { statusFromName } from '../services/orderService.js';
import { serializeOrder } from '../services/serializers.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import { parseOrderOrdering, positiveInt, queryString } from '../utils/query.js';
import type { RouteContext } from './context.js';

export function ordersRouter({ services, auth }: RouteContext): Router {
  const router = Router();
  router.use(auth);

  // GET /api/orders?status=pending&user_id=3&ordering=-total
  router.get('/', asyncHandler(async (req, res) => {
    const orders = await services.orders.list(requirePrincipal(req), {
      status: statusFromName(queryString(req.query.status)),
      userId: positiveInt(req.query.user_id),
      sort: parseOrderOrdering(req.query.ordering),
    });
    res.json(orders.map(serializeOrder));
  }));

  // POST /api/orders
  router.post('/', asyncHandler(async (req, res) => {
    const order = await services.orders.create(requirePrincipal(req));
    res.status(201).json(serializeOrder(order));
  }));

  // GET /api/orders/:id
  router.get('/:id', asyncHandler(async (req, res) => {
    const id = requirePathId(req.params.id, 'order');
    const order = await services.orders.retrieve(requirePrincipal(req), id);
    res.json(serializeOrder(order));
  }));

  // PATCH /api/orders/:id
  router.patch('/:id', asyncHandler(async (req, res) => {
    const id = requirePathId(req.params.id, 'order');
    const body = parseWith(updateOrderBody, req.body);
    const order = await services.orders.update(requirePrincipal(req), id, {
      deliveryCrewId: body.delivery_crew,
      status: body.status,
    });
    res.json(serializeOrder(order));
  }));

  router.all('/', methodNotAllowed('GET', 'POST'));
  router.all('/:id', methodNotAllowed('GET', 'PATCH'));

  return router;
}
