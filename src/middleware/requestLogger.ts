import type { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';

// One http-level log line per answered query.
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = process.hrtime();
  const { method, originalUrl } = req;

  res.on('finish', () => {
    const diff = process.hrtime(start);
    const durationMs = diff[0] * 1e3 + diff[1] * 1e-6;

    logger.http('OSCQuery request', {
      method,
      path: originalUrl,
      statusCode: res.statusCode,
      duration: `${durationMs.toFixed(1)}ms`,
    });
  });

  next();
};
