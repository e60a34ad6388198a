import rateLimit from 'express-rate-limit';
import { Request, Response } from 'express';
import { logSecurity } from '../utils/logger';
import { config } from '../config';

const getClientIdentifier = (req: Request): string => req.ip || 'unknown';

// Standard rate limit response
const rateLimitResponse = (req: Request, res: Response) => {
  logSecurity('Rate limit exceeded', 'medium', {
    identifier: getClientIdentifier(req),
    path: req.path,
    method: req.method,
  });

  res.status(429).json({
    success: false,
    error: 'Too many requests',
    message: 'You have exceeded the rate limit. Please try again later.',
    retryAfter: res.getHeader('Retry-After'),
  });
};

/**
 * Global rate limiter - in-memory store, one bucket per IP.
 * Every carrier check that gets through costs one upstream FMCSA call.
 */
export const globalLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  max: config.isDevelopment ? 1000 : config.rateLimit.maxRequests,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: getClientIdentifier,
  handler: rateLimitResponse,
  skip: (req) => config.isTest || req.path.startsWith('/health'),
});

export default globalLimiter;
