import type { Request, Response, NextFunction, RequestHandler } from 'express';

// ============================================================================
// SIMPLE IN-MEMORY RATE LIMITER
// Sliding window of request timestamps per client IP
// ============================================================================

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
  cleanupIntervalMs: number;
}

export interface RateLimiter {
  middleware: RequestHandler;
  /** Drop timestamps that fell out of the window. */
  cleanup(): void;
  stop(): void;
}

export function createRateLimiter(config: RateLimitConfig, now: () => number = Date.now): RateLimiter {
  const requestStore = new Map<string, number[]>(); // IP -> timestamps

  const cleanup = () => {
    const cutoff = now() - config.windowMs;
    for (const [ip, timestamps] of requestStore) {
      const recent = timestamps.filter(timestamp => timestamp > cutoff);
      if (recent.length === 0) {
        requestStore.delete(ip);
      } else {
        requestStore.set(ip, recent);
      }
    }
  };

  const timer = setInterval(cleanup, config.cleanupIntervalMs);
  timer.unref();

  const middleware = (req: Request, res: Response, next: NextFunction): void => {
    // express only honours forwarded headers under its 'trust proxy' setting
    const ip = req.ip || 'unknown';
    const current = now();
    const windowStart = current - config.windowMs;

    const timestamps = (requestStore.get(ip) ?? []).filter(timestamp => timestamp > windowStart);

    if (timestamps.length >= config.maxRequests) {
      requestStore.set(ip, timestamps);
      const retryAfterMs = timestamps[0] + config.windowMs - current;
      const retryAfterSec = Math.ceil(retryAfterMs / 1000);

      res.status(429).json({
        error: 'Too many requests',
        message: `Rate limit exceeded. Maximum ${config.maxRequests} requests per ${config.windowMs / 1000} seconds.`,
        retryAfter: retryAfterSec,
      });
      return;
    }

    timestamps.push(current);
    requestStore.set(ip, timestamps);
    next();
  };

  return {
    middleware,
    cleanup,
    stop: () => clearInterval(timer),
  };
}
