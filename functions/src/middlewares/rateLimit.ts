import rateLimit from 'express-rate-limit';
import * as functions from 'firebase-functions';

const FIFTEEN_MINUTES_MS = 15 * 60 * 1000;

/**
 * General API rate limiter
 * 300 requests per 15 minutes per IP
 */
export const apiLimiter = rateLimit({
  windowMs: FIFTEEN_MINUTES_MS,
  limit: 300,
  standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
  legacyHeaders: false, // Disable `X-RateLimit-*` headers
  handler: (req, res) => {
    functions.logger.warn(`[rate-limit] IP ${req.ip} exceeded general rate limit`);
    res.status(429).json({
      code: 'rate_limit_exceeded',
      message: 'Too many requests, please try again later.',
    });
  },
});

/**
 * Limiter for requests that call the model (synthesis and chat)
 * 40 requests per 15 minutes per IP
 */
export const strictLimiter = rateLimit({
  windowMs: FIFTEEN_MINUTES_MS,
  limit: 40,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    functions.logger.warn(`[rate-limit] IP ${req.ip} exceeded model request limit`);
    res.status(429).json({
      code: 'rate_limit_exceeded',
      message: 'Too many assistant requests, please try again later.',
    });
  },
});
