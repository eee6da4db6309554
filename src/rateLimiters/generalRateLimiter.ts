// generalRateLimiter.ts

import rateLimit from 'express-rate-limit';

/**
 * Limiter for the status API in production. The API is read-mostly and
 * meant for a handful of dashboards, so one minute windows keep bursts short.
 */
export const statusApiLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 120,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    code: 'TOO_MANY_REQUESTS',
    message: 'Too many status requests, please slow down.',
  },
});
