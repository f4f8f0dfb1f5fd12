import rateLimit from 'express-rate-limit';
import type { ErrorResponse } from './errorHandler.js';

const rateLimitedResponse: ErrorResponse = {
  code: 'RATE_LIMITED',
  message: 'Too many requests, please try again later.',
};

/**
 * Per-client limiter over a one-minute window.
 * Uses an in-memory store, so every instance counts on its own and resets on restart.
 */
export function createRateLimiter(limitPerMinute: number) {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: limitPerMinute,
    message: rateLimitedResponse,
    standardHeaders: true,
    legacyHeaders: false,
  });
}
