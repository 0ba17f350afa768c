import { Request, Response, NextFunction } from 'express';
import { UnauthorizedError } from '../types/error.types';
import { Actor } from '../types/invoice.types';
import { verifyAccessToken } from '../utils/jwt';
import { logger } from '../config/logger';

/**
 * Bearer token authentication middleware factory
 *
 * Sets `req.auth` from a valid `Authorization: Bearer <jwt>` header,
 * otherwise fails the request with 401
 */
export const authenticate = (secret: string) => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const header = req.headers.authorization;

    if (!header || !header.startsWith('Bearer ')) {
      next(new UnauthorizedError());
      return;
    }

    try {
      req.auth = verifyAccessToken(header.slice('Bearer '.length).trim(), secret);
      next();
    } catch (error) {
      logger.debug('Rejected bearer token', {
        path: req.path,
        reason: error instanceof Error ? error.message : String(error),
      });
      next(new UnauthorizedError('Invalid or expired token'));
    }
  };
};

/**
 * Caller identity set by `authenticate`
 */
export const requireActor = (req: Request): Actor => {
  if (!req.auth) {
    throw new UnauthorizedError();
  }

  return req.auth;
};
