import type { RequestHandler } from 'express';
import type { CartService } from '../services/cartService.js';
import type { CategoryService, MenuItemService } from '../services/catalogService.js';
import type { OrderService } from '../services/orderService.js';
import type { RoleService } from '../services/roles.js';
import type { UserService } from '../services/userService.js';
import type { PageSettings } from '../utils/query.js';

export interface AppServices {
  cart: CartService;
  orders: OrderService;
  categories: CategoryService;
  menuItems: MenuItemService;
  roles: RoleService;
  users: UserService;
}

/** What every router factory receives. */
export interface RouteContext {
  services: AppServices;
  /** Token check plus profile lookup. */
  auth: RequestHandler;
  /** Token check only. */
  verifyToken: RequestHandler;
  menuPages: PageSettings;
}
