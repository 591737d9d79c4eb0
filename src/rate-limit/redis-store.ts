/**
 * Redis-backed rate-limit counters (ioredis).
 *
 * INCR and the first PEXPIRE run in one Lua script, so a crash between
 * them cannot leave a counter without an expiry.
 */

import { Redis } from 'ioredis';
import { RateLimitStore } from './store';

export const INCREMENT_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
if count == 1 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
end
return count
`;

/** The slice of the ioredis client this store calls. */
export interface RedisEvalClient {
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
  quit?(): Promise<unknown>;
}

/** Adapt an ioredis client to RedisEvalClient. */
export function redisEvalClient(redis: Redis): RedisEvalClient {
  return {
    eval: (script, numKeys, ...args) => redis.eval(script, numKeys, ...args),
    quit: () => redis.quit(),
  };
}

export class RedisRateLimitStore implements RateLimitStore {
  constructor(
    private readonly client: RedisEvalClient,
    private readonly prefix = '',
  ) {}

  async increment(key: string, ttlMs: number): Promise<number> {
    const result = await this.client.eval(INCREMENT_SCRIPT, 1, `${this.prefix}${key}`, Math.max(1, Math.ceil(ttlMs)));
    if (typeof result !== 'number' || !Number.isInteger(result)) {
      throw new TypeError(`Unexpected rate-limit counter reply: ${String(result)}`);
    }
    return result;
  }

  async close(): Promise<void> {
    await this.client.quit?.();
  }
}
