import { Request, Response, NextFunction, RequestHandler } from 'express';
import helmet from 'helmet';
import { RATE_LIMITS } from '../config/constants.js';

// JSON-only API: nothing is rendered, so the CSP denies everything
export const securityMiddleware: RequestHandler[] = [
  helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  }),
];

/**
 * Sliding-window request limiter keyed by client IP
 */
export const rateLimitByIp = (windowMs: number, maxRequests: number): RequestHandler => {
  const requests = new Map<string, number[]>();

  const cleanupInterval = setInterval(() => {
    const cutoff = Date.now() - windowMs;

    for (const [ip, timestamps] of requests.entries()) {
      const last = timestamps[timestamps.length - 1];
      if (last === undefined || last < cutoff) {
        requests.delete(ip);
      }
    }

    // Drop the oldest 10% when too many clients are tracked
    if (requests.size > RATE_LIMITS.MAX_TRACKED_IPS) {
      const byLastSeen = Array.from(requests.entries())
        .map(([ip, timestamps]) => ({ ip, last: timestamps[timestamps.length - 1] ?? 0 }))
        .sort((a, b) => a.last - b.last);

      const toRemove = Math.ceil(requests.size * 0.1);
      for (const entry of byLastSeen.slice(0, toRemove)) {
        requests.delete(entry.ip);
      }
    }
  }, windowMs * 2);

  cleanupInterval.unref();

  return (req: Request, res: Response, next: NextFunction): void => {
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    const now = Date.now();
    const windowStart = now - windowMs;

    const recentRequests = (requests.get(ip) ?? []).filter(timestamp => timestamp > windowStart);
    requests.set(ip, recentRequests);

    const remaining = Math.max(0, maxRequests - recentRequests.length);
    const oldestRequest = recentRequests[0] ?? now;
    const resetSeconds = Math.ceil((oldestRequest + windowMs - now) / 1000);

    res.setHeader('X-RateLimit-Limit', maxRequests.toString());
    res.setHeader('X-RateLimit-Remaining', remaining.toString());
    res.setHeader('X-RateLimit-Reset', resetSeconds.toString());

    if (recentRequests.length >= maxRequests) {
      res.setHeader('Retry-After', resetSeconds.toString());
      res.status(429).json({
        error: {
          message: 'Too many requests',
          status: 429,
          retryAfter: resetSeconds,
        },
      });
      return;
    }

    recentRequests.push(now);
    next();
  };
};
