/**
 * User Lookup
 * Read-through cache for single users keyed by id (`user:<id>`).
 * No locking: concurrent misses for the same id each repopulate the entry,
 * and all of them write the same row.
 */

import type { User, UserId } from '@photofeed/shared';
import type { CacheStore } from '../../infrastructure/cache/cache.store.js';
import { readCached, userCodec, writeCached } from '../../infrastructure/cache/entity.codec.js';
import { CacheKeys } from '../../infrastructure/database/redis.client.js';
import type { UserRepository } from '../../infrastructure/database/repositories/repository.types.js';
import { createLogger } from '../../infrastructure/logging/logger.js';

const logger = createLogger('user-lookup');

/** Stands for "no user"; check `id === 0` */
export const ZERO_USER: User = Object.freeze({
  id: 0,
  accountName: '',
  passhash: '',
  authority: 0,
  delFlg: 0,
  createdAt: new Date(0),
});

export function isLoggedIn(user: User): boolean {
  return user.id !== 0;
}

export function isBanned(user: User): boolean {
  return user.delFlg !== 0;
}

export function isModerator(user: User): boolean {
  return user.authority !== 0;
}

export class UserLookup {
  constructor(
    private readonly cache: CacheStore,
    private readonly users: UserRepository,
    private readonly ttlSeconds: number
  ) {}

  /**
   * Returns ZERO_USER when no row exists
   */
  async getUser(id: UserId): Promise<User> {
    if (id <= 0) {
      return ZERO_USER;
    }

    const key = CacheKeys.user(id);
    const cached = await readCached(this.cache, key, userCodec);
    if (cached) {
      return cached;
    }

    const user = await this.users.findById(id);
    if (!user) {
      logger.debug({ userId: id }, 'User not found');
      return ZERO_USER;
    }

    await writeCached(this.cache, key, userCodec, user, this.ttlSeconds);
    return user;
  }

  /**
   * Batched variant: cache first per id, then one query for every miss.
   * Ids without a row are absent from the result.
   */
  async getUsers(ids: Iterable<UserId>): Promise<Map<UserId, User>> {
    const found = new Map<UserId, User>();
    const uncached: UserId[] = [];

    const unique = [...new Set(ids)];
    const cached = await Promise.all(
      unique.map((id) => readCached(this.cache, CacheKeys.user(id), userCodec))
    );
    unique.forEach((id, index) => {
      const user = cached[index];
      if (user) {
        found.set(id, user);
      } else {
        uncached.push(id);
      }
    });

    if (uncached.length > 0) {
      const loaded = await this.users.findByIds(uncached);
      for (const user of loaded) {
        found.set(user.id, user);
      }
      await Promise.all(loaded.map((user) =>
        writeCached(this.cache, CacheKeys.user(user.id), userCodec, user, this.ttlSeconds)
      ));
      logger.debug({ requested: uncached.length, loaded: loaded.length }, 'Loaded uncached users');
    }

    return found;
  }
}
