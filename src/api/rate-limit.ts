/**
 * Fixed-window rate limiter middleware.
 *
 * Each route class has its own budget per client. Counters are keyed by
 * `ratelimit:{routeClass}:{client}:{windowIndex}` and live in a
 * RateLimitStore (memory or Redis). A store failure is logged and the
 * request is let through.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { RouteClass } from '../domain/delivery';
import { CertificateError, rateLimitError } from '../domain/errors';
import { Logger, errorContext, logger as rootLogger } from '../logger';
import { RateLimitStore } from '../rate-limit/store';
import { clientIdentity } from './middleware';

export interface RateLimitOptions {
  routeClass: RouteClass;
  store: RateLimitStore;
  /** Maximum requests allowed within the window. Default: 60 */
  maxRequests?: number;
  /** Window duration in milliseconds. Default: 60_000 (1 minute) */
  windowMs?: number;
  /** Clock, injectable for tests. */
  now?: () => number;
  keyGenerator?: (req: Request) => string;
  logger?: Logger;
}

export function windowIndex(now: number, windowMs: number): number {
  return Math.floor(now / windowMs);
}

export function rateLimitKey(routeClass: RouteClass, client: string, window: number): string {
  return `ratelimit:${routeClass}:${client}:${window}`;
}

/**
 * Create a rate-limiting middleware for one route class.
 *
 * Sets RateLimit-Limit and RateLimit-Remaining on every counted request, and
 * Retry-After on rejection. Rejections go to the error handler as
 * RATE_LIMIT.EXCEEDED (429).
 */
export function rateLimit(options: RateLimitOptions): RequestHandler {
  const maxRequests = options.maxRequests ?? 60;
  const windowMs = options.windowMs ?? 60_000;
  const now = options.now ?? Date.now;
  const keyGenerator = options.keyGenerator ?? clientIdentity;
  const log = options.logger ?? rootLogger.child({ module: 'rate-limit' });

  return (req: Request, res: Response, next: NextFunction) => {
    const client = keyGenerator(req);
    const at = now();
    const window = windowIndex(at, windowMs);
    const resetAt = (window + 1) * windowMs;
    const key = rateLimitKey(options.routeClass, client, window);

    options.store.increment(key, resetAt - at).then(
      (count) => {
        res.set('RateLimit-Limit', String(maxRequests));
        res.set('RateLimit-Remaining', String(Math.max(0, maxRequests - count)));

        if (count > maxRequests) {
          const retryAfterMs = resetAt - at;
          res.set('Retry-After', String(Math.ceil(retryAfterMs / 1000)));
          log.warn('Rate limit exceeded', { routeClass: options.routeClass, client, count, limit: maxRequests });
          next(new CertificateError(rateLimitError(retryAfterMs, maxRequests, windowMs)));
          return;
        }
        next();
      },
      (err: unknown) => {
        log.error('Rate limit store failed; allowing request', {
          routeClass: options.routeClass,
          client,
          ...errorContext(err),
        });
        next();
      },
    );
  };
}

export interface RateLimitSettings {
  enabled: boolean;
  windowMs: number;
  budgets: Record<RouteClass, number>;
}

/** One limiter per route class, or pass-through handlers when disabled. */
export function createRateLimiters(
  settings: RateLimitSettings,
  store: RateLimitStore,
  now?: () => number,
): Record<RouteClass, RequestHandler> {
  const passThrough: RequestHandler = (_req, _res, next) => next();
  const limiter = (routeClass: RouteClass): RequestHandler =>
    settings.enabled
      ? rateLimit({ routeClass, store, maxRequests: settings.budgets[routeClass], windowMs: settings.windowMs, now })
      : passThrough;

  return {
    view: limiter('view'),
    preview: limiter('preview'),
    download: limiter('download'),
    batch: limiter('batch'),
    admin: limiter('admin'),
    login: limiter('login'),
  };
}
