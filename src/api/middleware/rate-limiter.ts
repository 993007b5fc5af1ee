/**
 * Ballot Ledger API — Rate Limiting Middleware
 *
 * In-memory fixed-window limiter.  Reads are keyed by client IP; relayed
 * votes are keyed by the voter named in the signed payload, so one voter
 * cannot drain the relayer by rotating IPs and one busy NAT does not
 * lock out every voter behind it.
 *
 * @module api/middleware/rate-limiter
 * @license AGPL-3.0-or-later
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { normalizeAddress } from "../../utils/address";

interface Window {
  count: number;
  resetAt: number;
}

/** Derives the bucket a request is counted against. */
export type RateLimitKey = (req: Request) => string;

export interface RateLimiterConfig {
  /** Maximum number of requests per window and key */
  maxRequests: number;
  /** Window size in milliseconds */
  windowMs: number;
  /** Defaults to the client IP */
  keyFor?: RateLimitKey;
  /** Millisecond clock, defaults to Date.now */
  now?: () => number;
}

export const clientIp: RateLimitKey = (req) =>
  req.ip || req.socket.remoteAddress || "unknown";

/**
 * Keys a relay request by `vote.voter` from its JSON body, falling back
 * to the client IP when the body names no valid voter.  Must run after
 * the JSON body parser.
 */
export const relayVoter: RateLimitKey = (req) => {
  const body: unknown = req.body;
  if (typeof body === "object" && body !== null && "vote" in body) {
    const vote: unknown = body.vote;
    if (typeof vote === "object" && vote !== null && "voter" in vote) {
      const voter = normalizeAddress(vote.voter);
      if (voter !== null) return `voter:${voter}`;
    }
  }
  return `ip:${clientIp(req)}`;
};

/**
 * @example
 * ```typescript
 * // 5 relayed votes per voter per minute
 * app.use("/v1/relay", createRateLimiter({ maxRequests: 5, windowMs: 60000, keyFor: relayVoter }));
 * ```
 */
export function createRateLimiter(config: RateLimiterConfig): RequestHandler {
  const windows = new Map<string, Window>();
  const keyFor = config.keyFor ?? clientIp;
  const now = config.now ?? Date.now;

  const sweep = setInterval(() => {
    const t = now();
    for (const [key, window] of windows) {
      if (window.resetAt <= t) windows.delete(key);
    }
  }, 5 * 60 * 1000);
  sweep.unref();

  return (req: Request, res: Response, next: NextFunction): void => {
    const key = keyFor(req);
    const t = now();

    let window = windows.get(key);
    if (!window || window.resetAt <= t) {
      window = { count: 0, resetAt: t + config.windowMs };
      windows.set(key, window);
    }
    window.count++;

    res.setHeader("X-RateLimit-Limit", config.maxRequests);
    res.setHeader("X-RateLimit-Remaining", Math.max(0, config.maxRequests - window.count));
    res.setHeader("X-RateLimit-Reset", Math.ceil(window.resetAt / 1000));

    if (window.count > config.maxRequests) {
      res.status(429).json({
        error: "RATE_LIMITED",
        message: "Too many requests. Please try again later.",
        details: { retry_after_ms: window.resetAt - t },
      });
      return;
    }

    next();
  };
}

/**
 * Limits per route family.
 */
export const rateLimiters = {
  /** Relayed votes: 5 per voter per minute */
  relay: createRateLimiter({ maxRequests: 5, windowMs: 60 * 1000, keyFor: relayVoter }),

  /** Read endpoints: 100 per IP per minute */
  read: createRateLimiter({ maxRequests: 100, windowMs: 60 * 1000 }),

  /** Event log and its integrity check: 50 per IP per minute */
  audit: createRateLimiter({ maxRequests: 50, windowMs: 60 * 1000 }),
};
