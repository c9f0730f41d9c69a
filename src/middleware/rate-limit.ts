/**
 * Rate Limiting
 * =============
 * Per-route limits on top of express-rate-limit, keyed by client IP + method
 * + route pattern. Counters live in Redis when REDIS_URL is set
 * (rate-limit-redis), otherwise in the library's in-process MemoryStore.
 *
 * Mount the returned middleware before `requireUser` / `requireRole` so
 * throttled requests never reach token verification.
 */

import type { Request, RequestHandler } from "express";
import { rateLimit as expressRateLimit, type Store } from "express-rate-limit";
import { RedisStore } from "rate-limit-redis";

import { TooManyRequestsError } from "../shared/errors.js";
import type { RedisClient } from "../shared/redis.js";

export type RateLimitRule = {
  times: number;
  seconds: number;
};

/**
 * Builds one store per limiter; express-rate-limit refuses to share a store
 * between limiters.
 */
export type RateLimitStoreFactory = () => Store;

type RedisScalar = boolean | number | string;

function isRedisScalar(value: unknown): value is RedisScalar {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function toRedisReply(value: unknown): RedisScalar | RedisScalar[] {
  if (isRedisScalar(value)) {return value;}
  if (Array.isArray(value) && value.every(isRedisScalar)) {return value;}
  throw new Error("Unexpected Redis reply for rate-limit command");
}

export function createRedisRateLimitStoreFactory(
  getClient: () => Promise<RedisClient>
): RateLimitStoreFactory {
  return () =>
    new RedisStore({
      prefix: "ratelimit:",
      sendCommand: async (...args: string[]) => {
        const client = await getClient();
        return toRedisReply(await client.sendCommand(args));
      },
    });
}

function routeKey(req: Request): string {
  const route: unknown = req.route;
  const pattern =
    typeof route === "object" && route !== null && "path" in route && typeof route.path === "string"
      ? route.path
      : req.path;
  return `${req.method}:${req.baseUrl}${pattern}`;
}

export type RateLimiterOptions = {
  enabled: boolean;
  /** Omit to keep counters in process memory. */
  storeFactory?: RateLimitStoreFactory;
};

/**
 * Returns a factory for per-route limiters. With `enabled = false` every
 * limiter is a pass-through.
 */
export function createRateLimiter(options: RateLimiterOptions) {
  return function rateLimit(rule: RateLimitRule): RequestHandler {
    if (!options.enabled) {
      return (_req, _res, next) => next();
    }

    return expressRateLimit({
      windowMs: rule.seconds * 1000,
      limit: rule.times,
      standardHeaders: "draft-7",
      legacyHeaders: false,
      store: options.storeFactory?.(),
      // Client IP resolution is governed by TRUST_PROXY, not by the header alone.
      validate: { xForwardedForHeader: false },
      keyGenerator: (req) => `${req.ip ?? "unknown"}:${routeKey(req)}`,
      handler: (_req, res, next) => {
        // Retry-After is already set by the library when the limit trips.
        const retryAfter = Number(res.getHeader("Retry-After"));
        next(new TooManyRequestsError(Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter : rule.seconds));
      },
    });
  };
}

export type RateLimitFactory = ReturnType<typeof createRateLimiter>;
