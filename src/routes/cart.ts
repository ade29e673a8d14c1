import { Router } from 'express';
import { methodNotAllowed } from '../middleware/errorHandler.js';
import { requirePrincipal } from '../middleware/auth.js';
import { parseWith, requirePathId } from '../lib/validation.js';
import { addToCartBody } from '../schemas/cart.js';
import { serializeCartItem } from '../services/serializers.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import type { RouteContext } from './context.js';

export function cartRouter({ services, auth }: RouteContext): Router {
  const router = Router();
  router.use(auth);

  // GET /api/cart
  router.get('/', asyncHandler(async (req, res) => {
    const lines = await services.cart.list(requirePrincipal(req));
    res.json(lines.map((line) => serializeCartItem(line, line.menuItemTitle)));
  }));

  // POST /api/cart
  router.post('/', asyncHandler(async (req, res) => {
    const body = parseWith(addToCartBody, req.body);
    const line = await services.cart.add(requirePrincipal(req), {
      menuItemId: body.menuitem,
      quantity: body.quantity,
    });
    res.status(201).json(serializeCartItem(line, line.menuItemTitle));
  }));

  // DELETE /api/cart/clear
  router.delete('/clear', asyncHandler(async (req, res) => {
    await services.cart.clear(requirePrincipal(req));
    res.status(204).send();
  }));

  // DELETE /api/cart/:id
  router.delete('/:id', asyncHandler(async (req, res) => {
    const id = requirePathId(req.params.id, 'cart item');
    await services.cart.remove(requirePrincipal(req), id);
    res.status(204).send();
  }));

  router.all('/', methodNotAllowed('GET', 'POST'));
  router.all('/clear', methodNotAllowed('DELETE'));
  router.all('/:id', methodNotAllowed('DELETE'));

  return router;
}
