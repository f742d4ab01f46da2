import rateLimit from 'express-rate-limit';

/**
 * API rate limiter (requests per minute per client).
 * Each app gets its own in-memory store (resets on server restart).
 */
export function createApiRateLimiter(limitPerMinute: number) {
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: limitPerMinute,
    message: 'Too many requests, please try again later.',
    standardHeaders: true,
    legacyHeaders: false,
  });
}
