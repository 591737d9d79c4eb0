/**
 * Long-lived connections shared by the server and the command-line tools.
 */

import { Pool } from 'pg';
import { Redis } from 'ioredis';
import { AppConfig } from './config';
import { errorContext, logger } from './logger';
import { RateLimitStore, MemoryRateLimitStore } from './rate-limit/store';
import { RedisRateLimitStore, redisEvalClient } from './rate-limit/redis-store';
import { createMemoryStore } from './storage/memory-store';
import { createPostgresStore, poolClient } from './storage/postgres-store';
import { Store } from './storage/store';

export interface Closable {
  close(): Promise<void>;
}

export interface StoreResource extends Closable {
  store: Store;
}

export interface Resources extends StoreResource {
  rateLimitStore: RateLimitStore;
}

/** PostgreSQL when DATABASE_URL is set (table migrated on open), memory otherwise. */
export async function openStore(config: AppConfig): Promise<StoreResource> {
  if (!config.databaseUrl) {
    return { store: createMemoryStore(), close: async () => undefined };
  }
  const pool = new Pool({ connectionString: config.databaseUrl, max: 10 });
  pool.on('error', (err) => logger.error('Idle database client error', errorContext(err)));
  const store = createPostgresStore(poolClient(pool));
  try {
    await store.certificates.migrate();
  } catch (err) {
    await pool.end();
    throw err;
  }
  return { store, close: () => pool.end() };
}

function openRedisStore(url: string): RateLimitStore {
  // Commands fail fast while disconnected; the limiter then fails open.
  const redis = new Redis(url, { maxRetriesPerRequest: 1, enableOfflineQueue: false });
  redis.on('error', (err) => logger.error('Redis connection error', errorContext(err)));
  return new RedisRateLimitStore(redisEvalClient(redis));
}

export async function openResources(config: AppConfig): Promise<Resources> {
  const { store, close: closeStore } = await openStore(config);
  const rateLimitStore = config.redisUrl ? openRedisStore(config.redisUrl) : new MemoryRateLimitStore();
  const closers: Array<() => Promise<unknown>> = [async () => rateLimitStore.close?.(), closeStore];

  return {
    store,
    rateLimitStore,
    close: async () => {
      for (const close of closers) {
        await close().catch((err: unknown) => logger.error('Shutdown step failed', errorContext(err)));
      }
    },
  };
}
