import { Router } from 'express';
import { NotFoundError } from '../lib/errors.js';
import { requireStaff } from '../middleware/auth.js';
import { methodNotAllowed } from '../middleware/errorHandler.js';
import { parsePathId, parseWith } from '../lib/validation.js';
import { groupMemberBody } from '../schemas/users.js';
import { GROUP_LABELS } from '../services/roles.js';
import { serializeUser } from '../services/serializers.js';
import type { GroupRole } from '../types/domain.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import type { RouteContext } from './context.js';

/** Membership of one role group, mounted at /api/groups/<group>/users. */
export function groupRouter({ services, auth }: RouteContext, role: GroupRole): Router {
  const router = Router();
  const label = GROUP_LABELS[role];
  router.use(auth, requireStaff());

  router.get('/', asyncHandler(async (_req, res) => {
    const members = await services.roles.members(role);
    res.json(members.map(serializeUser));
  }));

  router.post('/', asyncHandler(async (req, res) => {
    const { username } = parseWith(groupMemberBody, req.body);
    await services.roles.grant(username, role);
    res.status(201).json({ message: `User '${username}' was successfully added to ${label} group` });
  }));

  router.delete('/', (_req, _res, next) => next(new NotFoundError('User ID is required')));

  router.delete('/:id', asyncHandler(async (req, res) => {
    const userId = parsePathId(req.params.id);
    if (userId === null) throw new NotFoundError(`Invalid user ID format: ${req.params.id}`);
    await services.roles.revoke(userId, role);
    res.status(204).send();
  }));

  router.all('/', methodNotAllowed('GET', 'POST'));
  router.all('/:id', methodNotAllowed('DELETE'));

  return router;
}
