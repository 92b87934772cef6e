import type { Request, Response, NextFunction } from 'express';

type RateLimitOptions = {
  windowMs: number;
  max: number;
  now?: () => number;
};

type RateLimitState = {
  count: number;
  resetAt: number;
};

/**
 * Fixed-window limiter keyed by client IP. A non-positive window or limit
 * disables it.
 */
export function createRateLimiter({ windowMs, max, now = Date.now }: RateLimitOptions) {
  if (windowMs <= 0 || max <= 0) {
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  const hits = new Map<string, RateLimitState>();

  return (req: Request, res: Response, next: NextFunction) => {
    const timestamp = now();
    const key = req.ip || 'unknown';
    let state = hits.get(key);

    if (!state || timestamp >= state.resetAt) {
      // Evict expired windows
      for (const [client, entry] of hits) {
        if (timestamp >= entry.resetAt) hits.delete(client);
      }
      state = { count: 0, resetAt: timestamp + windowMs };
      hits.set(key, state);
    }

    state.count += 1;
    res.setHeader('X-RateLimit-Limit', String(max));
    res.setHeader('X-RateLimit-Remaining', String(Math.max(0, max - state.count)));
    res.setHeader('X-RateLimit-Reset', String(state.resetAt));

    if (state.count > max) {
      res.setHeader('Retry-After', String(Math.ceil((state.resetAt - timestamp) / 1000)));
      res.status(429).json({
        error: 'RATE_LIMITED',
        message: 'Too many job submissions. Please retry later.',
      });
      return;
    }

    next();
  };
}
