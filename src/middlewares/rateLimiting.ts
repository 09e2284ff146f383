/**
 * Rate Limiting Middleware
 * Per-IP request budgets over a shared 15 minute window.
 * Each call builds a limiter with its own counters; build them per app.
 */

import rateLimit, { type RateLimitRequestHandler } from "express-rate-limit";

const WINDOW_MS = 15 * 60 * 1000;

function perIpLimiter(limit: number, message: string): RateLimitRequestHandler {
  return rateLimit({
    windowMs: WINDOW_MS,
    limit,
    message,
    standardHeaders: "draft-7",
    legacyHeaders: false,
  });
}

/** Every route: 200 requests per window. */
export function createApiLimiter(): RateLimitRequestHandler {
  return perIpLimiter(200, "Too many requests from this IP, please try again later.");
}

/**
 * POST /convert: 20 per window. Each one may hold a 200 MB download
 * and an ffmpeg process.
 */
export function createConvertLimiter(): RateLimitRequestHandler {
  return perIpLimiter(20, "Too many conversions, please slow down.");
}
