import { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { HttpError, MethodNotAllowedError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

function isMalformedJson(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof MethodNotAllowedError && err.allow.length) {
      res.setHeader('Allow', err.allow.join(', '));
    }
    if (err instanceof HttpError) {
      res.status(err.status).json(err.toJSON());
      return;
    }
    if (isMalformedJson(err)) {
      res.status(400).json({ error: 'Malformed JSON request body' });
      return;
    }
    logger.error({ err, method: req.method, path: req.originalUrl }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  };
}

/** Terminal handler for a route that exists but not for this method. */
export function methodNotAllowed(...allow: string[]): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    next(new MethodNotAllowedError(req.method, allow));
  };
}

export function notFound(): RequestHandler {
  return (_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  };
}
