import rateLimit from 'express-rate-limit';

/**
 * Rate limiter for write endpoints
 * Limits to 60 requests per minute per IP address
 */
export const writeRateLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: 60,
    message: 'Too many write requests, please try again later',
    standardHeaders: true,
    legacyHeaders: false,
});
