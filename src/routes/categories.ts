import { Router } from 'express';
import { requireStaff } from '../middleware/auth.js';
import { methodNotAllowed } from '../middleware/errorHandler.js';
import { parseWith, requirePathId } from '../lib/validation.js';
import { createCategoryBody, updateCategoryBody } from '../schemas/catalog.js';
import { serializeCategory } from '../services/serializers.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import { parseTitleOrdering, queryString } from '../utils/query.js';
import type { RouteContext } from './context.js';

export function categoriesRouter({ services, auth }: RouteContext): Router {
  const router = Router();
  const { categories } = services;
  router.use(auth);

  router.get('/', asyncHandler(async (req, res) => {
    const rows = await categories.list({
      search: queryString(req.query.search)?.trim() || undefined,
      titleDirection: parseTitleOrdering(req.query.ordering),
    });
    res.json(rows.map(serializeCategory));
  }));

  router.post('/', requireStaff(), asyncHandler(async (req, res) => {
    const created = await categories.create(parseWith(createCategoryBody, req.body));
    res.status(201).json(serializeCategory(created));
  }));

  router.get('/:id', asyncHandler(async (req, res) => {
    const category = await categories.retrieve(requirePathId(req.params.id, 'category'));
    res.json(serializeCategory(category));
  }));

  router.put('/:id', requireStaff(), asyncHandler(async (req, res) => {
    const id = requirePathId(req.params.id, 'category');
    const updated = await categories.update(id, parseWith(createCategoryBody, req.body));
    res.json(serializeCategory(updated));
  }));

  router.patch('/:id', requireStaff(), asyncHandler(async (req, res) => {
    const id = requirePathId(req.params.id, 'category');
    const updated = await categories.update(id, parseWith(updateCategoryBody, req.body));
    res.json(serializeCategory(updated));
  }));

  // Forbidden for every role
  router.delete('/:id', () => categories.remove());

  router.all('/', methodNotAllowed('GET', 'POST'));
  router.all('/:id', methodNotAllowed('GET', 'PUT', 'PATCH', 'DELETE'));

  return router;
}
