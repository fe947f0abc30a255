/**
 * In-memory sliding-window rate limiter.
 *
 * Guards the status endpoint: every status call lists the caller's whole
 * storage prefix, so tight polling loops are turned away with 429. Keyed by
 * the verified user id, falling back to the client address. Single-process
 * only.
 */

import { Response, NextFunction } from 'express';
import { apiError, rateLimitError } from '../domain/errors';
import { AuthenticatedRequest } from './middleware';

interface RateLimitEntry {
  /** Request timestamps inside the current window, oldest first. */
  timestamps: number[];
}

export interface RateLimitOptions {
  /** Maximum requests allowed within the window. */
  maxRequests: number;
  /** Window duration in milliseconds. Default: 60_000 */
  windowMs?: number;
  now?: () => number;
}

export function rateLimit(options: RateLimitOptions) {
  const { maxRequests } = options;
  const windowMs = options.windowMs ?? 60_000;
  const now = options.now ?? Date.now;
  const store = new Map<string, RateLimitEntry>();

  const cleanupInterval = setInterval(() => {
    const cutoff = now() - windowMs;
    for (const [key, entry] of store) {
      entry.timestamps = entry.timestamps.filter((t) => t > cutoff);
      if (entry.timestamps.length === 0) {
        store.delete(key);
      }
    }
  }, windowMs);
  cleanupInterval.unref();

  return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    const key = req.userId ?? req.ip ?? req.socket.remoteAddress ?? 'unknown';
    const timestamp = now();
    const cutoff = timestamp - windowMs;

    let entry = store.get(key);
    if (!entry) {
      entry = { timestamps: [] };
      store.set(key, entry);
    }
    entry.timestamps = entry.timestamps.filter((t) => t > cutoff);

    res.set('RateLimit-Limit', String(maxRequests));

    if (entry.timestamps.length >= maxRequests) {
      const retryAfterMs = entry.timestamps[0] + windowMs - timestamp;
      res.set('RateLimit-Remaining', '0');
      res.set('Retry-After', String(Math.ceil(retryAfterMs / 1000)));
      res.status(429).json(apiError(rateLimitError(retryAfterMs)));
      return;
    }

    entry.timestamps.push(timestamp);
    res.set('RateLimit-Remaining', String(maxRequests - entry.timestamps.length));
    next();
  };
}
