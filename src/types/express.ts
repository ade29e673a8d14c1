import type { VerifiedToken } from '../lib/firebaseAdmin.js';
import type { Principal } from './domain.js';

declare global {
  namespace Express {
    interface Request {
      /** Set by `authenticate()` for callers with a registered profile. */
      principal?: Principal;
      /** Set by `verifyBearer()`; present even when no profile exists yet. */
      identity?: VerifiedToken;
    }
  }
}

export {};
