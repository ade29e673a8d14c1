import { Router } from 'express';
import { AuthenticationError } from '../lib/errors.js';
import { requirePrincipal, requireStaff } from '../middleware/auth.js';
import { methodNotAllowed } from '../middleware/errorHandler.js';
import { parseWith } from '../lib/validation.js';
import { registerBody } from '../schemas/users.js';
import { serializeUser } from '../services/serializers.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import type { RouteContext } from './context.js';

export function usersRouter({ services, auth, verifyToken }: RouteContext): Router {
  const router = Router();

  // POST /api/users/register - first call after signing in with the identity provider
  router.post('/register', verifyToken, asyncHandler(async (req, res) => {
    const identity = req.identity;
    if (!identity) throw new AuthenticationError('Missing bearer token');
    const { username } = parseWith(registerBody, req.body);
    const user = await services.users.register({ uid: identity.uid, username, email: identity.email });
    res.status(201).json(serializeUser(user));
  }));

  router.get('/me', auth, asyncHandler(async (req, res) => {
    const user = await services.users.me(requirePrincipal(req).id);
    res.json(serializeUser(user));
  }));

  router.get('/', auth, requireStaff(), asyncHandler(async (_req, res) => {
    const users = await services.users.list();
    res.json(users.map(serializeUser));
  }));

  router.all('/register', methodNotAllowed('POST'));
  router.all('/me', methodNotAllowed('GET'));
  router.all('/', methodNotAllowed('GET'));

  return router;
}
