import { Express, Request, Response } from 'express';
import { cartRouter } from './cart.js';
import { categoriesRouter } from './categories.js';
import type { RouteContext } from './context.js';
import { groupRouter } from './groups.js';
import { menuItemsRouter } from './menuItems.js';
import { ordersRouter } from './orders.js';
import { usersRouter } from './users.js';

export type { AppServices, RouteContext } from './context.js';

export function registerRoutes(app: Express, ctx: RouteContext): void {
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), uptime: process.uptime() });
  });

  // API Routes
  app.use('/api/users', usersRouter(ctx));
  app.use('/api/groups/manager/users', groupRouter(ctx, 'manager'));
  app.use('/api/groups/delivery-crew/users', groupRouter(ctx, 'delivery-crew'));
  app.use('/api/categories', categoriesRouter(ctx));
  app.use('/api/menu-items', menuItemsRouter(ctx));
  app.use('/api/cart', cartRouter(ctx));
  app.use('/api/orders', ordersRouter(ctx));
}
