import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { SecuritySettings } from '../../settings/schema';

/**
 * API rate limiter sized from the security settings
 * Returns null when security.rate_limiting is off
 */
export function createRateLimiter(
  security: Pick<SecuritySettings, 'rate_limiting' | 'max_requests_per_minute'>
): RateLimitRequestHandler | null {
  if (!security.rate_limiting) {
    return null;
  }

  const limit = security.max_requests_per_minute;
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: limit,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      res.status(429).json({
        success: false,
        data: null,
        error: {
          code: 'RATE_LIMIT_EXCEEDED',
          message: 'Too many requests. Please try again later.',
          details: {
            limit,
            window: '1 minute',
          },
        },
        timestamp: new Date().toISOString(),
      });
    },
  });
}
