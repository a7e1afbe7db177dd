import rateLimit from 'express-rate-limit';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import Logger from 'bunyan';

// Pass-through middleware for development and test
const noOpLimiter = (_req: Request, _res: Response, next: NextFunction) => next();

/**
 * Extract client IP address from request
 * Properly handles X-Forwarded-For header and falls back to socket address
 */
export function getClientIp(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  const first = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  if (first) {
    // X-Forwarded-For can be a comma-separated list; use the first IP
    return first.split(',')[0].trim();
  }

  return req.ip || req.socket.remoteAddress || 'unknown';
}

/**
 * IP-based rate limiter for the fee lookup endpoint.
 * Disabled in development/test environments.
 */
export function createFeeLimiter({
  nodeEnv,
  maxPerMinute,
  logger,
}: {
  nodeEnv: string;
  maxPerMinute: number;
  logger: Logger;
}): RequestHandler {
  if (nodeEnv === 'development' || nodeEnv === 'test') {
    return noOpLimiter;
  }

  return rateLimit({
    windowMs: 60 * 1000,
    limit: maxPerMinute,
    keyGenerator: getClientIp,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req: Request, res: Response) => {
      logger.warn({ ip: getClientIp(req), path: req.path }, 'Rate limit exceeded');
      res.status(429).json({
        error: 'Too many requests',
        message: 'You have exceeded the rate limit. Please try again later.',
        retryAfter: 60,
      });
    },
  });
}
