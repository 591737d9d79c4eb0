import express from 'express';
import { createRateLimiters, rateLimit, rateLimitKey, windowIndex } from '../../src/api/rate-limit';
import { errorHandler } from '../../src/api/middleware';
import { RouteClass } from '../../src/domain/delivery';
import { MemoryRateLimitStore, RateLimitStore } from '../../src/rate-limit/store';
import { field, request } from '../helpers';

const PAGE = { appName: 'Test Certificates', appUrl: 'https://certs.example.org' };

function appWith(limiter: express.RequestHandler): express.Application {
  const app = express();
  app.get('/limited', limiter, (_req, res) => {
    res.json({ ok: true });
  });
  app.use(errorHandler(PAGE));
  return app;
}

describe('windowIndex and rateLimitKey', () => {
  it('buckets time into fixed windows', () => {
    expect(windowIndex(59_999, 60_000)).toBe(0);
    expect(windowIndex(60_000, 60_000)).toBe(1);
    expect(rateLimitKey('view', '203.0.113.5', 28_000_000)).toBe('ratelimit:view:203.0.113.5:28000000');
  });
});

describe('rateLimit middleware', () => {
  let clock: number;
  let store: MemoryRateLimitStore;

  beforeEach(() => {
    clock = 120_000;
    store = new MemoryRateLimitStore({ now: () => clock });
  });

  afterEach(async () => {
    await store.close();
  });

  function limited(maxRequests: number): express.Application {
    return appWith(
      rateLimit({ routeClass: 'view', store, maxRequests, windowMs: 60_000, now: () => clock, keyGenerator: () => 'c1' }),
    );
  }

  it('sets the budget headers', async () => {
    const res = await request(limited(3), 'GET', '/limited');

    expect(res.status).toBe(200);
    expect(res.headers.get('ratelimit-limit')).toBe('3');
    expect(res.headers.get('ratelimit-remaining')).toBe('2');
  });

  it('answers 429 once the budget is spent', async () => {
    const app = limited(2);
    await request(app, 'GET', '/limited');
    await request(app, 'GET', '/limited');
    clock += 15_000;
    const res = await request(app, 'GET', '/limited');

    expect(res.status).toBe(429);
    expect(res.headers.get('retry-after')).toBe('45');
    expect(res.headers.get('ratelimit-remaining')).toBe('0');
    expect(field(res.json, 'error', 'code')).toBe('RATE_LIMIT.EXCEEDED');
    expect(field(res.json, 'error', 'details')).toEqual({ retryAfterMs: 45_000, limit: 2, windowMs: 60_000 });
  });

  it('opens a fresh budget in the next window', async () => {
    const app = limited(1);
    await request(app, 'GET', '/limited');
    expect((await request(app, 'GET', '/limited')).status).toBe(429);

    clock += 60_000;
    expect((await request(app, 'GET', '/limited')).status).toBe(200);
  });

  it('keeps separate budgets per client', async () => {
    let client = 'c1';
    const app = appWith(
      rateLimit({ routeClass: 'view', store, maxRequests: 1, now: () => clock, keyGenerator: () => client }),
    );
    await request(app, 'GET', '/limited');
    client = 'c2';

    expect((await request(app, 'GET', '/limited')).status).toBe(200);
  });

  it('lets the request through when the store fails', async () => {
    const broken: RateLimitStore = {
      increment: () => Promise.reject(new Error('connection refused')),
    };
    const res = await request(appWith(rateLimit({ routeClass: 'view', store: broken, maxRequests: 1 })), 'GET', '/limited');

    expect(res.status).toBe(200);
    expect(res.headers.get('ratelimit-limit')).toBeNull();
  });
});

describe('createRateLimiters', () => {
  const budgets: Record<RouteClass, number> = { view: 1, preview: 1, download: 1, batch: 1, admin: 1, login: 1 };

  it('gives every route class its own counter', async () => {
    const store = new MemoryRateLimitStore();
    const keys: string[] = [];
    const recording: RateLimitStore = {
      increment: (key, ttlMs) => {
        keys.push(key.split(':')[1]);
        return store.increment(key, ttlMs);
      },
    };
    const limiters = createRateLimiters({ enabled: true, windowMs: 60_000, budgets }, recording);
    await request(appWith(limiters.view), 'GET', '/limited');
    const res = await request(appWith(limiters.preview), 'GET', '/limited');
    await store.close();

    expect(res.status).toBe(200);
    expect(keys).toEqual(['view', 'preview']);
  });

  it('passes everything through when disabled', async () => {
    const increments: string[] = [];
    const counting: RateLimitStore = {
      increment: async (key) => {
        increments.push(key);
        return 1;
      },
    };
    const limiters = createRateLimiters({ enabled: false, windowMs: 60_000, budgets }, counting);
    const app = appWith(limiters.login);
    await request(app, 'GET', '/limited');

    expect((await request(app, 'GET', '/limited')).status).toBe(200);
    expect(increments).toEqual([]);
  });
});
