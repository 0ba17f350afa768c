import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';

/**
 * Request logging middleware
 *
 * One line per request once the response is sent. Bodies are not logged:
 * invoices carry customer and payment data.
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();

  logger.debug('Incoming request', {
    method: req.method,
    path: req.path,
    query: req.query,
    ip: req.ip,
  });

  res.on('finish', () => {
    const meta = {
      method: req.method,
      path: req.originalUrl.split('?')[0],
      statusCode: res.statusCode,
      duration: `${Date.now() - startTime}ms`,
      ...(req.auth && { userId: req.auth.userId, role: req.auth.role }),
    };

    if (res.statusCode >= 500) {
      logger.error('Request completed', meta);
    } else {
      logger.info('Request completed', meta);
    }
  });

  next();
};
