import { Router } from 'express';
import { NotFoundError } from '../lib/errors.js';
import { requireStaff } from '../middleware/auth.js';
import { methodNotAllowed } from '../middleware/errorHandler.js';
import { parseWith, requirePathId } from '../lib/validation.js';
import { createMenuItemBody, updateMenuItemBody } from '../schemas/catalog.js';
import type { MenuItemInput } from '../repositories/types.js';
import { serializeMenuItem } from '../services/serializers.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import {
  INVALID_PAGE,
  pageCount,
  pageLink,
  parseMenuOrdering,
  parsePageRequest,
  queryString,
} from '../utils/query.js';
import type { RouteContext } from './context.js';

function toInput(body: {
  title?: string;
  price?: number;
  featured?: boolean;
  category_id?: number;
}): Partial<MenuItemInput> {
  const input: Partial<MenuItemInput> = {};
  if (body.title !== undefined) input.title = body.title;
  if (body.price !== undefined) input.priceCents = body.price;
  if (body.featured !== undefined) input.featured = body.featured;
  if (body.category_id !== undefined) input.categoryId = body.category_id;
  return input;
}

export function menuItemsRouter({ services, auth, menuPages }: RouteContext): Router {
  const router = Router();
  const { menuItems } = services;
  router.use(auth);

  // GET /api/menu-items?search=&category_title=&title=&ordering=&page=&page_size=
  router.get('/', asyncHandler(async (req, res) => {
    const { page, pageSize, offset } = parsePageRequest(req.query, menuPages);
    const result = await menuItems.list({
      search: queryString(req.query.search)?.trim() || undefined,
      categoryTitle: queryString(req.query.category_title)?.trim() || undefined,
      title: queryString(req.query.title),
      sort: parseMenuOrdering(req.query.ordering),
      offset,
      limit: pageSize,
    });
    const pages = pageCount(result.count, pageSize);
    if (page > pages) throw new NotFoundError(INVALID_PAGE);
    res.json({
      count: result.count,
      next: page < pages ? pageLink(req, page + 1) : null,
      previous: page > 1 ? pageLink(req, page - 1) : null,
      results: result.items.map(serializeMenuItem),
    });
  }));

  router.post('/', requireStaff(), asyncHandler(async (req, res) => {
    const body = parseWith(createMenuItemBody, req.body);
    const created = await menuItems.create({
      title: body.title,
      priceCents: body.price,
      featured: body.featured,
      categoryId: body.category_id,
    });
    res.status(201).json(serializeMenuItem(created));
  }));

  router.get('/:id', asyncHandler(async (req, res) => {
    const item = await menuItems.retrieve(requirePathId(req.params.id, 'menu item'));
    res.json(serializeMenuItem(item));
  }));

  router.put('/:id', requireStaff(), asyncHandler(async (req, res) => {
    const id = requirePathId(req.params.id, 'menu item');
    const updated = await menuItems.update(id, toInput(parseWith(createMenuItemBody, req.body)));
    res.json(serializeMenuItem(updated));
  }));

  router.patch('/:id', requireStaff(), asyncHandler(async (req, res) => {
    const id = requirePathId(req.params.id, 'menu item');
    const updated = await menuItems.update(id, toInput(parseWith(updateMenuItemBody, req.body)));
    res.json(serializeMenuItem(updated));
  }));

  router.delete('/:id', requireStaff(), asyncHandler(async (req, res) => {
    await menuItems.remove(requirePathId(req.params.id, 'menu item'));
    res.status(204).send();
  }));

  router.all('/', methodNotAllowed('GET', 'POST'));
  router.all('/:id', methodNotAllowed('GET', 'PUT', 'PATCH', 'DELETE'));

  return router;
}
