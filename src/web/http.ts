import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../core/types.js';
import type { UserRepository } from '../db/users.js';

declare global {
  namespace Express {
    interface Request {
      userId?: number;
      sessionToken?: string;
    }
  }
}

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/** Bearer-token check against the sessions table. */
export function requireAuth(users: UserRepository): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const header = req.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) return next(new HttpError(401, 'Unauthorized'));

    const token = header.slice('Bearer '.length).trim();
    const userId = users.getSessionUserId(token);
    if (userId === null) return next(new HttpError(401, 'Invalid or expired token'));

    req.userId = userId;
    req.sessionToken = token;
    next();
  };
}

export function currentUser(req: Request): number {
  if (req.userId === undefined) throw new HttpError(401, 'Unauthorized');
  return req.userId;
}

// body-parser errors carry their own status (400 bad JSON, 413 too large)
function clientStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const status = err.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof HttpError) {
      res.status(err.status).json({ error: err.message });
      return;
    }
    const status = clientStatus(err);
    if (status !== undefined) {
      res.status(status).json({ error: err instanceof Error ? err.message : 'Bad request' });
      return;
    }
    logger.error(`[api] ${req.method} ${req.path} failed: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    res.status(500).json({ error: 'Internal server error' });
  };
}
