import type { Request, Response, NextFunction } from 'express';
import { apiLogger } from '../../utils/logger.js';

export function isValidInternalKey(authorization: string | undefined, internalKey: string | undefined): boolean {
  if (!internalKey) return false;
  return authorization?.replace('Bearer ', '') === internalKey;
}

/**
 * Bearer-key check for internal endpoints.
 * Without a configured key every request is refused.
 */
export function internalAuth(internalKey: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!isValidInternalKey(req.headers.authorization, internalKey)) {
      apiLogger.warn({ path: req.path }, 'Invalid internal API key');
      res.status(401).json({ error: 'Invalid internal API key' });
      return;
    }

    next();
  };
}
