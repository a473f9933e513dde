// Asset Registry - Rate Limiter
//
// Fixed-window request limiting per client address. The X-Caller header is
// chosen by the client, so it never selects the window.

import { Request, Response, NextFunction, RequestHandler } from 'express';

// =============================================================================
// Types
// =============================================================================

export interface RateLimitConfig {
  /** Maximum requests allowed in the window */
  maxRequests: number;
  /** Window length in milliseconds */
  windowMs: number;
  /** Message returned when limited */
  message?: string;
  /** Derive the client key (default: forwarded or socket address) */
  keyGenerator?: (req: Request) => string;
}

interface WindowEntry {
  count: number;
  resetAt: number;
}

// =============================================================================
// Rate Limiter Class
// =============================================================================

export class RateLimiter {
  private readonly windows: Map<string, WindowEntry> = new Map();
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly message: string;
  private readonly keyGenerator: (req: Request) => string;
  private sweepTimer: NodeJS.Timeout | null;

  constructor(config: RateLimitConfig) {
    this.maxRequests = config.maxRequests;
    this.windowMs = config.windowMs;
    this.message = config.message ?? 'Too many requests, please try again later';
    this.keyGenerator = config.keyGenerator ?? clientKey;

    this.sweepTimer = setInterval(() => this.sweep(), Math.max(this.windowMs, 1000));
    this.sweepTimer.unref();
  }

  middleware(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const key = this.keyGenerator(req);
      const { limited, count, resetAt } = this.hit(key);

      res.setHeader('X-RateLimit-Limit', this.maxRequests);
      res.setHeader('X-RateLimit-Remaining', Math.max(0, this.maxRequests - count));

      if (limited) {
        res.status(429).json({
          error: 'RATE_LIMITED',
          message: this.message,
          retryAfter: Math.ceil((resetAt - Date.now()) / 1000),
        });
        return;
      }

      next();
    };
  }

  /**
   * Count one request for `key` and report whether it is over the limit.
   */
  isRateLimited(key: string): boolean {
    return this.hit(key).limited;
  }

  getRemaining(key: string): number {
    const entry = this.windows.get(key);
    if (!entry || Date.now() >= entry.resetAt) {
      return this.maxRequests;
    }
    return Math.max(0, this.maxRequests - entry.count);
  }

  reset(key: string): void {
    this.windows.delete(key);
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private hit(key: string): { limited: boolean; count: number; resetAt: number } {
    const now = Date.now();
    let entry = this.windows.get(key);

    if (!entry || now >= entry.resetAt) {
      entry = { count: 0, resetAt: now + this.windowMs };
      this.windows.set(key, entry);
    }

    entry.count++;
    return { limited: entry.count > this.maxRequests, count: entry.count, resetAt: entry.resetAt };
  }

  private sweep(): void {
    const now = Date.now();
    for (const [key, entry] of this.windows) {
      if (now >= entry.resetAt) {
        this.windows.delete(key);
      }
    }
  }
}

function clientKey(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  if (typeof forwarded === 'string') {
    return forwarded.split(',')[0].trim();
  }
  return req.ip || req.socket.remoteAddress || 'unknown';
}

// =============================================================================
// Pre-configured Rate Limiters
// =============================================================================

/**
 * Query rate limiter: 100 requests per minute per client
 */
export function createQueryRateLimiter(): RateLimiter {
  return new RateLimiter({
    maxRequests: 100,
    windowMs: 60_000,
    message: 'Too many queries, please try again later',
  });
}

/**
 * Mutation rate limiter: 30 intents per minute per client
 */
export function createMutationRateLimiter(): RateLimiter {
  return new RateLimiter({
    maxRequests: 30,
    windowMs: 60_000,
    message: 'Too many registry operations, please try again later',
  });
}
