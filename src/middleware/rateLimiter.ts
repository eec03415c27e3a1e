import rateLimit from 'express-rate-limit';

const baseOptions = {
  windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '60000', 10),
  validate: { xForwardedForHeader: false },
  message: { error: 'Too many requests' },
};

/**
 * Limiter allowing `max` requests per window and client
 */
export const createRateLimiter = (max: number) => rateLimit({ ...baseOptions, max });

export const defaultLimiter = createRateLimiter(parseInt(process.env.RATE_LIMIT_MAX || '120', 10));

// Guards analysis runs
export const strictLimiter = createRateLimiter(parseInt(process.env.RATE_LIMIT_STRICT_MAX || '10', 10));
