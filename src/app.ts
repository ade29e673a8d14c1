import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import morgan from 'morgan';
import swaggerUi from 'swagger-ui-express';
import { config } from './lib/config.js';
import { TokenVerifier, verifyFirebaseToken } from './lib/firebaseAdmin.js';
import { buildSwaggerSpec } from './lib/swagger.js';
import { authenticate, verifyBearer } from './middleware/auth.js';
import { errorHandler, notFound } from './middleware/errorHandler.js';
import type { Store } from './repositories/types.js';
import { registerRoutes } from './routes/index.js';
import { CartService } from './services/cartService.js';
import { CategoryService, MenuItemService } from './services/catalogService.js';
import { Clock, OrderService } from './services/orderService.js';
import { RoleService } from './services/roles.js';
import { UserService } from './services/userService.js';
import type { PageSettings } from './utils/query.js';

export interface AppOptions {
  store: Store;
  verifyToken?: TokenVerifier;
  clock?: Clock;
  menuPages?: PageSettings;
}

export function createApp({
  store,
  verifyToken = verifyFirebaseToken,
  clock,
  menuPages = config.menu,
}: AppOptions): Express {
  const app = express();

  // CSP off: the /docs UI runs inline scripts
  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(cors());
  app.use(express.json());

  if (config.env !== 'test') {
    app.use(morgan(config.env === 'production' ? 'combined' : 'dev'));
  }

  const roles = new RoleService(store.users);
  registerRoutes(app, {
    services: {
      cart: new CartService(store),
      orders: new OrderService(store, roles, clock),
      categories: new CategoryService(store),
      menuItems: new MenuItemService(store),
      roles,
      users: new UserService(store.users),
    },
    auth: authenticate({ users: store.users, verifyToken }),
    verifyToken: verifyBearer(verifyToken),
    menuPages,
  });

  app.use('/docs', swaggerUi.serve, swaggerUi.setup(buildSwaggerSpec()));

  app.use(notFound());
  app.use(errorHandler());

  return app;
}
