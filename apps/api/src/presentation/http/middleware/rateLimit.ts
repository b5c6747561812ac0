/**
 * Rate Limiting Middleware
 */

import rateLimit, { ipKeyGenerator } from "express-rate-limit";

const RATE_LIMIT_WINDOWS = {
  FIFTEEN_MINUTES: 15 * 60 * 1000,
  ONE_MINUTE: 60 * 1000,
} as const;

const RATE_LIMIT_MAX_REQUESTS = {
  API_GENERAL: 100,
  COMPARE: 10,
} as const;

/**
 * General API rate limiter
 * Limits: 100 requests per 15 minutes per IP
 */
export const apiLimiter = rateLimit({
  windowMs: RATE_LIMIT_WINDOWS.FIFTEEN_MINUTES,
  limit: RATE_LIMIT_MAX_REQUESTS.API_GENERAL,
  message: {
    error: "Too many requests",
    code: "TOO_MANY_REQUESTS",
    retryAfter: "15 minutes",
  },
  standardHeaders: true,
  legacyHeaders: false,
  skip: (req) => req.path === "/health",
});

/**
 * Compare rate limiter
 * Each call costs two model completions.
 * Limits: 10 requests per minute per IP
 */
export const compareLimiter = rateLimit({
  windowMs: RATE_LIMIT_WINDOWS.ONE_MINUTE,
  limit: RATE_LIMIT_MAX_REQUESTS.COMPARE,
  message: {
    error: "Compare request limit exceeded",
    code: "TOO_MANY_REQUESTS",
    retryAfter: "1 minute",
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => {
    const ip = req.ip || req.socket.remoteAddress || "unknown";
    return `compare:${ipKeyGenerator(ip)}`;
  },
});
