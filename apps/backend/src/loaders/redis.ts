import { Redis } from 'ioredis';
import { env } from '../config/env.js';
import { logger } from '../lib/logger.js';

let client: Redis | null = null;

export function createRedisClient(): Redis {
  const instance = new Redis(env.REDIS_URL, {
    keyPrefix: `${env.REDIS_NAMESPACE}:`,
    lazyConnect: true,
    maxRetriesPerRequest: 3
  });

  instance.on('connect', () => logger.info('Redis connected'));
  instance.on('error', (error: Error) => logger.error({ error }, 'Redis error'));

  client = instance;
  return instance;
}

export async function disconnectRedis(): Promise<void> {
  if (client) {
    await client.quit();
    client = null;
  }
}
