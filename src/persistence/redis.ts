import Redis from 'ioredis';
import { loadConfig } from '../config/env';
import { logger } from '../utils/logger';

let redis: Redis | null = null;

/**
 * Get or create Redis client
 */
export function getRedisClient(): Redis {
  if (!redis) {
    const config = loadConfig();

    redis = new Redis({
      host: config.REDIS_HOST,
      port: config.REDIS_PORT,
      password: config.REDIS_PASSWORD,
      db: config.REDIS_DB,
      retryStrategy: (times: number) => {
        const delay = Math.min(times * 50, 2000);
        return delay;
      },
      // Session reads fail fast instead of queueing while disconnected
      maxRetriesPerRequest: 3
    });

    redis.on('error', (err) => {
      logger.error({ error: err.message }, 'Redis client error');
    });

    redis.on('connect', () => {
      logger.info('Redis client connected');
    });
  }

  return redis;
}

/**
 * Close Redis connection
 */
export async function closeRedis(): Promise<void> {
  if (redis) {
    await redis.quit();
    redis = null;
  }
}

/**
 * Test Redis connection
 */
export async function testRedisConnection(): Promise<boolean> {
  try {
    const client = getRedisClient();
    await client.ping();
    return true;
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Redis connection test failed');
    return false;
  }
}
