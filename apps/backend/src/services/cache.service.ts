import type { Redis as RedisClient } from 'ioredis';
import type { ICacheService, ILogger } from '@enfyra/types';

/**
 * Redis-backed cache for values derived from the database.
 *
 * Keys are written through the client's namespace prefix (`REDIS_NAMESPACE:`),
 * which ioredis applies to every command, so callers always pass bare keys.
 */
export class CacheService implements ICacheService {
  constructor(
    private readonly redis: RedisClient,
    private readonly logger: ILogger
  ) {}

  async get<T>(key: string): Promise<T | null> {
    const cached = await this.redis.get(key);
    if (cached === null) {
      return null;
    }

    try {
      const parsed: T = JSON.parse(cached);
      return parsed;
    } catch (error) {
      this.logger.warn({ key, error }, 'Discarding unparseable cache entry');
      await this.redis.del(key);
      return null;
    }
  }

  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    const payload = JSON.stringify(value);
    if (ttlSeconds) {
      await this.redis.set(key, payload, 'EX', ttlSeconds);
    } else {
      await this.redis.set(key, payload);
    }
  }

  async del(key: string): Promise<number> {
    return await this.redis.del(key);
  }
}
