/**
 * Cache Store
 * Best-effort key-value access over Redis. Errors and timeouts never reach the
 * caller: a failed get is a miss, a failed set or delete is logged and dropped.
 */

import { createLogger, errorMessage } from '../logging/logger.js';

const logger = createLogger('cache-store');

export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
}

/**
 * The slice of the ioredis API the store needs
 */
export interface CacheClient {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
}

export class CacheTimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`Cache ${operation} timed out after ${timeoutMs}ms`);
    this.name = 'CacheTimeoutError';
  }
}

/**
 * Rejects with CacheTimeoutError once `timeoutMs` elapses
 */
export async function withTimeout<T>(
  operation: string,
  promise: Promise<T>,
  timeoutMs: number
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new CacheTimeoutError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class RedisCacheStore implements CacheStore {
  constructor(
    private readonly client: CacheClient,
    private readonly timeoutMs: number
  ) {}

  async get(key: string): Promise<string | null> {
    try {
      const value = await withTimeout('get', this.client.get(key), this.timeoutMs);
      logger.debug({ key, hit: value !== null }, value !== null ? 'Cache HIT' : 'Cache MISS');
      return value;
    } catch (error) {
      logger.warn({ error: errorMessage(error), key }, 'Cache get failed, treating as miss');
      return null;
    }
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    try {
      await withTimeout('set', this.client.setex(key, ttlSeconds, value), this.timeoutMs);
      logger.debug({ key, ttl: ttlSeconds }, 'Cache SET');
    } catch (error) {
      logger.warn({ error: errorMessage(error), key }, 'Cache set failed');
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await withTimeout('delete', this.client.del(key), this.timeoutMs);
      logger.debug({ key }, 'Cache DEL');
    } catch (error) {
      logger.warn({ error: errorMessage(error), key }, 'Cache delete failed');
    }
  }
}
