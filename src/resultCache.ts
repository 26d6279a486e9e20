import { Redis } from 'ioredis';

import { config } from './config.js';
import { createLogger } from './logger.js';

const log = createLogger('cache');

export type CacheOptions = {
  redisEnabled?: boolean;
  redisUrl?: string;
  ttlSeconds?: number;
  maxEntries?: number;
};

/**
 * Serialized JSON bodies of pure query results. Keys embed the store
 * fingerprint, so entries from an older snapshot are simply never asked for.
 */
export interface ResultCache {
  readonly mode: 'redis' | 'memory';
  getOrCompute(key: string, compute: () => unknown): Promise<string>;
  close(): Promise<void>;
}

export class MemoryResultCache implements ResultCache {
  readonly mode = 'memory' as const;
  private readonly entries = new Map<string, { body: string; expiresAt: number }>();

  constructor(private readonly ttlSeconds: number, private readonly maxEntries: number) {}

  async getOrCompute(key: string, compute: () => unknown): Promise<string> {
    const now = Date.now();
    const hit = this.entries.get(key);
    if (hit && hit.expiresAt > now) return hit.body;

    const body = JSON.stringify(compute());
    this.entries.delete(key);
    this.entries.set(key, { body, expiresAt: now + this.ttlSeconds * 1000 });
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return body;
  }

  get size(): number {
    return this.entries.size;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}

class RedisResultCache implements ResultCache {
  readonly mode = 'redis' as const;

  constructor(private readonly redis: Redis, private readonly ttlSeconds: number) {}

  async getOrCompute(key: string, compute: () => unknown): Promise<string> {
    const redisKey = `result:${key}`;
    const cached = await this.redis.get(redisKey);
    if (cached !== null) return cached;
    const body = JSON.stringify(compute());
    await this.redis.set(redisKey, body, 'EX', this.ttlSeconds);
    return body;
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

export function createResultCache(opts: CacheOptions = {}): ResultCache {
  const enabled = opts.redisEnabled ?? config.REDIS_ENABLED;
  const ttl = Math.max(1, Math.floor(opts.ttlSeconds ?? config.CACHE_TTL_SECONDS));
  if (!enabled) {
    const max = Math.max(1, Math.floor(opts.maxEntries ?? config.CACHE_MAX_ENTRIES));
    log.info(`in-memory result cache (max ${max} entries, ttl ${ttl}s)`);
    return new MemoryResultCache(ttl, max);
  }
  const url = opts.redisUrl ?? config.REDIS_URL;
  const redis = url ? new Redis(url) : new Redis();
  redis.on('error', (e: Error) => log.error(`redis: ${e.message}`));
  log.info(`redis result cache at ${url ?? 'localhost:6379'} (ttl ${ttl}s)`);
  return new RedisResultCache(redis, ttl);
}
