import { NextFunction, Request, RequestHandler, Response } from 'express';
import { AuthenticationError, AuthorizationError } from '../lib/errors.js';
import { TokenVerifier, VerifiedToken, verifyFirebaseToken } from '../lib/firebaseAdmin.js';
import { logger } from '../lib/logger.js';
import type { UserRepository } from '../repositories/types.js';
import { isStaff, toPrincipal } from '../services/roles.js';
import type { Principal } from '../types/domain.js';
import '../types/express.js';

export interface AuthOptions {
  users: UserRepository;
  verifyToken?: TokenVerifier;
}

function bearerToken(req: Request): string | null {
  const header = req.headers.authorization ?? '';
  if (!header.startsWith('Bearer ')) return null;
  const token = header.slice('Bearer '.length).trim();
  return token || null;
}

async function verify(req: Request, verifyToken: TokenVerifier): Promise<VerifiedToken> {
  const token = bearerToken(req);
  if (!token) throw new AuthenticationError('Missing bearer token');
  try {
    return await verifyToken(token);
  } catch (err) {
    logger.warn({ err }, 'Token verification failed');
    throw new AuthenticationError('Invalid or expired token');
  }
}

/** Verifies the token only. Used by registration, before a profile exists. */
export function verifyBearer(verifyToken: TokenVerifier = verifyFirebaseToken): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      req.identity = await verify(req, verifyToken);
      next();
    } catch (err) {
      next(err);
    }
  };
}

/** Verifies the token and resolves it to a stored profile. */
export function authenticate({ users, verifyToken = verifyFirebaseToken }: AuthOptions): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      const identity = await verify(req, verifyToken);
      const user = await users.findByUid(identity.uid);
      if (!user) throw new AuthenticationError('No profile registered for this account');
      req.identity = identity;
      req.principal = toPrincipal(user, identity.uid);
      next();
    } catch (err) {
      next(err);
    }
  };
}

export function requirePrincipal(req: Request): Principal {
  if (!req.principal) throw new AuthenticationError('Authentication credentials were not provided');
  return req.principal;
}

export function requireStaff(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const principal = req.principal;
    if (!principal) return next(new AuthenticationError('Authentication credentials were not provided'));
    if (!isStaff(principal)) return next(new AuthorizationError());
    return next();
  };
}
