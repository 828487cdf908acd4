import rateLimit from 'express-rate-limit';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../utils/logger.js';

export type QueryRateLimitOptions = {
  windowMs: number;
  max: number; // 0 turns limiting off
};

const passThrough: RequestHandler = (_req: Request, _res: Response, next: NextFunction) => next();

// Per-IP limit on discovery queries
export function queryRateLimit({ windowMs, max }: QueryRateLimitOptions): RequestHandler {
  if (max <= 0) return passThrough;

  return rateLimit({
    windowMs,
    limit: max,
    standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
    legacyHeaders: false, // Disable the `X-RateLimit-*` headers
    handler: (req: Request, res: Response) => {
      logger.warn('Rate limit exceeded', {
        ip: req.ip,
        method: req.method,
        path: req.path,
      });

      res.status(429).json({ error: 'Too Many Requests' });
    },
  });
}
