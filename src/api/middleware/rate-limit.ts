/**
 * Rate Limiting Middleware for the Mastery API
 *
 * Fixed-window request counting per client, kept in an in-memory Map owned
 * by each limiter instance. Entries whose window has passed are swept out at
 * most once per window, on the next request. Two tiers are used:
 *
 * 1. General endpoints (RATE_LIMIT_MAX_REQUESTS per window)
 * 2. Generation endpoints that call the model provider
 *    (RATE_LIMIT_LLM_MAX_REQUESTS per window)
 *
 * Rate limit information is communicated via HTTP headers:
 * - X-RateLimit-Limit: Maximum requests allowed in window
 * - X-RateLimit-Remaining: Requests remaining in current window
 * - X-RateLimit-Reset: Unix timestamp when the window resets
 *
 * When rate limited, returns 429 Too Many Requests with JSON body:
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "RATE_LIMITED",
 *     "message": "Too many requests. Please try again later.",
 *     "details": { "retryAfter": 45 }
 *   }
 * }
 * ```
 *
 * @example
 * ```typescript
 * app.use('/api/*', generalRateLimiter());
 * app.post('/api/projects/:id/quizzes', llmRateLimiter(), handler);
 * ```
 */

import type { MiddlewareHandler, Context } from 'hono';
import { config } from '../../config';

export interface RateLimitConfig {
  /** Time window in milliseconds */
  windowMs: number;
  /** Maximum number of requests allowed in the window */
  maxRequests: number;
  /** Custom key generator function (defaults to IP-based) */
  keyGenerator?: (c: Context) => string;
  /** Message returned when rate limited */
  message?: string;
  /** Backing store; a fresh Map per limiter by default */
  store?: Map<string, RateLimitEntry>;
}

export interface RateLimitEntry {
  count: number;
  windowStart: number;
}

/**
 * Limits taken from the environment configuration.
 */
export const RATE_LIMITS = {
  GENERAL: {
    windowMs: config.rateLimit.windowMs,
    maxRequests: config.rateLimit.maxRequests,
  },
  LLM: {
    windowMs: config.rateLimit.windowMs,
    maxRequests: config.rateLimit.llmMaxRequests,
  },
} as const;

/**
 * Uses the first x-forwarded-for address, then x-real-ip.
 */
function defaultKeyGenerator(c: Context): string {
  const forwardedFor = c.req.header('x-forwarded-for');
  if (forwardedFor) {
    return forwardedFor.split(',')[0].trim();
  }
  return c.req.header('x-real-ip') ?? 'unknown-client';
}

function removeExpiredEntries(
  store: Map<string, RateLimitEntry>,
  windowMs: number,
  now: number
): void {
  for (const [key, entry] of Array.from(store.entries())) {
    if (now - entry.windowStart >= windowMs) {
      store.delete(key);
    }
  }
}

export function rateLimiter(limits: RateLimitConfig): MiddlewareHandler {
  const {
    windowMs,
    maxRequests,
    keyGenerator = defaultKeyGenerator,
    message = 'Too many requests. Please try again later.',
    store = new Map<string, RateLimitEntry>(),
  } = limits;

  let lastSweep = Date.now();

  return async (c, next) => {
    const now = Date.now();
    if (now - lastSweep >= windowMs) {
      removeExpiredEntries(store, windowMs, now);
      lastSweep = now;
    }

    const clientKey = keyGenerator(c);

    let entry = store.get(clientKey);
    if (!entry || now - entry.windowStart >= windowMs) {
      // New window
      entry = { count: 0, windowStart: now };
      store.set(clientKey, entry);
    }

    const remaining = Math.max(0, maxRequests - entry.count - 1);
    const resetTime = Math.ceil((entry.windowStart + windowMs) / 1000);

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(remaining));
    c.header('X-RateLimit-Reset', String(resetTime));

    if (entry.count >= maxRequests) {
      const retryAfter = Math.ceil((entry.windowStart + windowMs - now) / 1000);
      c.header('Retry-After', String(retryAfter));

      return c.json(
        {
          success: false,
          error: {
            code: 'RATE_LIMITED',
            message,
            details: { retryAfter },
          },
        },
        429
      );
    }

    entry.count++;
    return next();
  };
}

export function generalRateLimiter(overrides?: Partial<RateLimitConfig>): MiddlewareHandler {
  return rateLimiter({ ...RATE_LIMITS.GENERAL, ...overrides });
}

/**
 * Limiter for routes that call the model provider.
 */
export function llmRateLimiter(overrides?: Partial<RateLimitConfig>): MiddlewareHandler {
  return rateLimiter({ ...RATE_LIMITS.LLM, ...overrides });
}
