// packages/limits/src/index.ts
import type { Request, RequestHandler } from "express";
import rateLimit from "express-rate-limit";

export interface LimitsConfig {
  /**
   * Rate limit window in milliseconds, e.g. 60000 for 1 minute.
   */
  windowMs: number;
  /**
   * Max number of requests per key per window.
   */
  limit: number;
}

/**
 * Key for a request: the asserted hop identity, then the first
 * X-Forwarded-For address, then the socket address.
 */
export function limitKey(req: Request): string {
  const caller = req.get("x-caller-id")?.trim();
  if (caller) return `id:${caller}`;

  const xf = req.get("x-forwarded-for");
  const first = xf?.split(",")[0]?.trim();
  if (first) return `ip:${first}`;

  return `ip:${req.ip ?? req.socket.remoteAddress ?? "unknown"}`;
}

/**
 * Per-caller rate limit. Over-limit requests get 429 with the usual
 * failure body.
 */
export function limitByCaller(config: LimitsConfig): RequestHandler {
  return rateLimit({
    windowMs: config.windowMs,
    limit: config.limit,
    keyGenerator: limitKey,
    standardHeaders: true,
    legacyHeaders: false,
    // we read X-Forwarded-For ourselves
    validate: { xForwardedForHeader: false },
    handler: (req, res) => {
      console.warn("[limits:exceeded]", { key: limitKey(req), path: req.path });
      res.status(429).json({
        success: false,
        error: "rate_limited",
        message: "Too many requests",
      });
    },
  });
}
