/**
 * Rate limiting middleware: token bucket per client.
 *
 * Each client gets a token bucket with configurable fill rate and
 * burst capacity. Returns 429 with Retry-After header when the bucket
 * is empty.
 */

import type { Context, MiddlewareHandler } from "hono";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Token Bucket
// =============================================================================

interface Bucket {
  tokens: number;
  lastRefill: number;
}

export interface RateLimitConfig {
  /** Requests per minute (fill rate) */
  readonly rpm: number;
  /** Maximum burst capacity */
  readonly burst: number;
  /** Default: Date.now */
  readonly now?: () => number;
}

export interface ConsumeResult {
  readonly allowed: boolean;
  readonly remaining: number;
  readonly retryAfterMs: number;
}

export class TokenBucketStore {
  private readonly _buckets = new Map<string, Bucket>();
  private readonly _rpm: number;
  private readonly _burst: number;
  private readonly _now: () => number;

  constructor(config: RateLimitConfig) {
    this._rpm = config.rpm;
    this._burst = config.burst;
    this._now = config.now ?? Date.now;
  }

  /**
   * Try to consume a token for the given client.
   */
  consume(clientId: string): ConsumeResult {
    const now = this._now();
    let bucket = this._buckets.get(clientId);

    if (bucket === undefined) {
      bucket = { tokens: this._burst, lastRefill: now };
      this._buckets.set(clientId, bucket);
    }

    // Refill tokens based on elapsed time
    const elapsedMs = now - bucket.lastRefill;
    const tokensToAdd = (elapsedMs / 60000) * this._rpm;
    bucket.tokens = Math.min(this._burst, bucket.tokens + tokensToAdd);
    bucket.lastRefill = now;

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return {
        allowed: true,
        remaining: Math.floor(bucket.tokens),
        retryAfterMs: 0,
      };
    }

    // Time until the next whole token
    const retryAfterMs = Math.ceil(((1 - bucket.tokens) / this._rpm) * 60000);
    return {
      allowed: false,
      remaining: 0,
      retryAfterMs,
    };
  }

  get size(): number {
    return this._buckets.size;
  }

  clear(): void {
    this._buckets.clear();
  }
}

// =============================================================================
// Client Identity
// =============================================================================

export const CLIENT_ID_HEADER = "X-Client-Id";

/**
 * Bucket key for a request: X-Client-Id, else the first X-Forwarded-For
 * address, else one shared "anonymous" bucket.
 */
export function clientIdOf(c: Context): string {
  const explicit = c.req.header(CLIENT_ID_HEADER)?.trim();
  if (explicit !== undefined && explicit.length > 0) {
    return explicit;
  }
  const forwarded = c.req.header("X-Forwarded-For")?.split(",")[0]?.trim();
  if (forwarded !== undefined && forwarded.length > 0) {
    return forwarded;
  }
  return "anonymous";
}

// =============================================================================
// Middleware
// =============================================================================

export function rateLimitMiddleware(store: TokenBucketStore): MiddlewareHandler {
  return async (c, next) => {
    const result = store.consume(clientIdOf(c));

    c.header("X-RateLimit-Remaining", String(result.remaining));

    if (!result.allowed) {
      const retryAfterSec = Math.ceil(result.retryAfterMs / 1000);
      c.header("Retry-After", String(retryAfterSec));
      return c.json(
        createErrorEnvelope(
          "RATE_LIMITED",
          `Rate limit exceeded. Retry after ${retryAfterSec} seconds.`,
        ),
        429,
      );
    }

    return next();
  };
}
