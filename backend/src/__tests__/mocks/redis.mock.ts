/**
 * Redis Client Mock
 * In-memory stand-in for the ioredis commands the cache store issues
 */

import { vi } from 'vitest';
import type { CacheClient } from '../../infrastructure/cache/cache.store.js';

/** `fail` rejects every command, `hang` never settles */
export type MockRedisMode = 'normal' | 'fail' | 'hang';

export class MockRedisClient implements CacheClient {
  private store: Map<string, string> = new Map();
  private expireTimes: Map<string, number> = new Map();
  private mode: MockRedisMode = 'normal';

  async get(key: string): Promise<string | null> {
    await this.gate('get');
    this.checkExpiry(key);
    return this.store.get(key) ?? null;
  }

  async setex(key: string, seconds: number, value: string): Promise<'OK'> {
    await this.gate('setex');
    this.store.set(key, value);
    this.expireTimes.set(key, Date.now() + seconds * 1000);
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    await this.gate('del');
    let count = 0;
    for (const key of keys) {
      this.expireTimes.delete(key);
      if (this.store.delete(key)) count++;
    }
    return count;
  }

  // Test helpers
  setMode(mode: MockRedisMode): void {
    this.mode = mode;
  }

  /** Writes bypassing the mode, for seeding */
  seed(key: string, value: string): void {
    this.store.set(key, value);
  }

  peek(key: string): string | undefined {
    this.checkExpiry(key);
    return this.store.get(key);
  }

  ttlOf(key: string): number | undefined {
    const expireAt = this.expireTimes.get(key);
    return expireAt === undefined ? undefined : Math.round((expireAt - Date.now()) / 1000);
  }

  keys(): string[] {
    return [...this.store.keys()];
  }

  clear(): void {
    this.store.clear();
    this.expireTimes.clear();
    this.mode = 'normal';
  }

  private async gate(command: string): Promise<void> {
    if (this.mode === 'fail') {
      throw new Error(`Redis ${command} failed: connection refused`);
    }
    if (this.mode === 'hang') {
      await new Promise<never>(() => undefined);
    }
  }

  private checkExpiry(key: string): void {
    const expireTime = this.expireTimes.get(key);
    if (expireTime && Date.now() > expireTime) {
      this.store.delete(key);
      this.expireTimes.delete(key);
    }
  }
}

export const createMockRedis = () => {
  const mock = new MockRedisClient();
  return {
    client: mock,
    spies: {
      get: vi.spyOn(mock, 'get'),
      setex: vi.spyOn(mock, 'setex'),
      del: vi.spyOn(mock, 'del'),
    },
  };
};
