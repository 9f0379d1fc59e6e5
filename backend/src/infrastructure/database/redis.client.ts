/**
 * Redis Client for the photo feed
 * Used for: user cache, home feed cache, profile aggregate cache
 */

import { Redis } from 'ioredis';
import type { RedisOptions } from 'ioredis';
import { getRedisUrl, type Config } from '../../config/index.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('redis-client');

/**
 * Creates a client owned by the caller. The process keeps one for its lifetime
 * and closes it on shutdown.
 */
export function createRedisClient(config: Config): Redis {
  const options: RedisOptions = {
    maxRetriesPerRequest: 1,
    retryStrategy(times: number) {
      const delay = Math.min(times * 200, 5000);
      logger.warn({ attempt: times, delay }, 'Redis connection retry');
      return delay;
    },
    connectTimeout: 10000,
    commandTimeout: config.cache.timeoutMs,
    lazyConnect: true,
    enableReadyCheck: true,
  };

  if (config.redis.password) {
    options.password = config.redis.password;
  }

  const client = new Redis(getRedisUrl(config), options);

  client.on('connect', () => {
    logger.debug('Redis TCP connection established');
  });

  client.on('ready', () => {
    logger.info('Redis ready');
  });

  client.on('error', (error: Error) => {
    logger.error({ error: error.message }, 'Redis error');
  });

  client.on('close', () => {
    logger.warn('Redis connection closed');
  });

  client.on('reconnecting', (delay: number) => {
    logger.warn({ delay }, 'Redis reconnecting');
  });

  return client;
}

export async function closeRedisClient(client: Redis): Promise<void> {
  await client.quit();
  logger.info('Redis closed');
}

/**
 * Key formats are shared with every process reading the same cache.
 */
export const CacheKeys = {
  user: (userId: number) => `user:${userId}`,
  account: (accountName: string) => `account:${accountName}`,
  indexPosts: () => 'index_posts',
} as const;
