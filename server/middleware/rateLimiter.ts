/**
 * Rate Limiting Middleware
 *
 * A plan fans out to three paid APIs, so planning is limited per IP.
 *
 * Tiers:
 * - Trip planning: 20/min per IP
 * - General API (status etc.): 100/min per IP
 */

import rateLimit from "express-rate-limit";
import type { Request } from "express";

/**
 * Trip planning rate limiter
 * 20 requests per minute per IP
 */
export const planRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 20,
  message: {
    success: false,
    error: "Too many planning requests. Please wait before trying again.",
    error_code: "rate_limited",
    retryAfter: 60,
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIP(req),
});

/**
 * General API rate limiter (fallback)
 * 100 requests per minute per IP
 */
export const generalRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 100,
  message: {
    success: false,
    error: "Too many requests. Please slow down.",
    error_code: "rate_limited",
    retryAfter: 60,
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIP(req),
});

/** First address in x-forwarded-for when a proxy set one, else the socket peer. */
export function getClientIP(req: Request): string {
  const header = req.headers["x-forwarded-for"];
  const chain = Array.isArray(header) ? header.join(",") : header ?? "";
  const first = chain
    .split(",")
    .map((hop) => hop.trim())
    .find((hop) => hop.length > 0);

  return first ?? req.ip ?? req.socket.remoteAddress ?? "unknown";
}
