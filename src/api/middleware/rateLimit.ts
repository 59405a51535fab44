import { Request, Response, NextFunction, RequestHandler } from 'express';

interface WindowCounter {
  count: number;
  windowStart: number;
}

export interface RequestRateLimiterOptions {
  maxRequests: number;
  windowMs: number;
  now?: () => number;
}

// Expired windows are pruned once this many clients are tracked
const PRUNE_THRESHOLD = 10_000;

/**
 * Fixed-window request counter per client key. Owned by whoever creates the
 * app, so each app instance (and each test) gets its own counters.
 */
export class RequestRateLimiter {
  private readonly counters = new Map<string, WindowCounter>();
  private readonly now: () => number;

  constructor(private readonly options: RequestRateLimiterOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Count a request for `key`; false once the key has used up its window
   */
  hit(key: string): boolean {
    const now = this.now();
    const counter = this.counters.get(key);

    if (!counter || now - counter.windowStart >= this.options.windowMs) {
      this.prune(now);
      this.counters.set(key, { count: 1, windowStart: now });
      return true;
    }

    if (counter.count >= this.options.maxRequests) {
      return false;
    }

    counter.count++;
    return true;
  }

  private prune(now: number): void {
    if (this.counters.size < PRUNE_THRESHOLD) {
      return;
    }
    for (const [key, counter] of this.counters) {
      if (now - counter.windowStart >= this.options.windowMs) {
        this.counters.delete(key);
      }
    }
  }
}

export function rateLimit(limiter: RequestRateLimiter): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const clientKey = req.ip ?? req.socket.remoteAddress ?? 'unknown';

    if (!limiter.hit(clientKey)) {
      console.warn(`🚦 Rate limit exceeded for IP: ${clientKey}`);
      res.status(429).json({ message: 'Rate limit exceeded. Please try again later.' });
      return;
    }

    next();
  };
}
