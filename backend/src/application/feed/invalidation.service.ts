/**
 * Invalidation Controller
 * Evicts the cache entries a committed write can have staled. Runs after the
 * write, best-effort: nothing here can fail the request that triggered it.
 *
 *   post created     -> index_posts, account:<author>
 *   comment created  -> index_posts, account:<commenter>, account:<post owner>
 *   user banned      -> user:<id>, index_posts
 */

import type { PostId, UserId } from '@photofeed/shared';
import type { CacheStore } from '../../infrastructure/cache/cache.store.js';
import { CacheKeys } from '../../infrastructure/database/redis.client.js';
import type { PostRepository } from '../../infrastructure/database/repositories/repository.types.js';
import { createLogger, errorMessage } from '../../infrastructure/logging/logger.js';
import { isLoggedIn, type UserLookup } from '../users/user-lookup.service.js';

const logger = createLogger('invalidation');

export class InvalidationController {
  constructor(
    private readonly cache: CacheStore,
    private readonly userLookup: UserLookup,
    private readonly posts: PostRepository
  ) {}

  async onPostCreated(authorId: UserId): Promise<void> {
    await this.cache.delete(CacheKeys.indexPosts());
    await this.evictProfileOf(authorId);
  }

  async onCommentCreated(commentAuthorId: UserId, postId: PostId): Promise<void> {
    await this.cache.delete(CacheKeys.indexPosts());
    await this.evictProfileOf(commentAuthorId);

    let ownerAccountName: string | null;
    try {
      ownerAccountName = await this.posts.findOwnerAccountName(postId);
    } catch (error) {
      logger.warn({ postId, error: errorMessage(error) }, 'Post owner lookup failed, skipping profile eviction');
      return;
    }

    if (ownerAccountName === null) {
      logger.warn({ postId }, 'Post owner not found, skipping profile eviction');
      return;
    }
    await this.cache.delete(CacheKeys.account(ownerAccountName));
  }

  async onUserBanned(userId: UserId): Promise<void> {
    await this.cache.delete(CacheKeys.user(userId));
    await this.cache.delete(CacheKeys.indexPosts());
  }

  private async evictProfileOf(userId: UserId): Promise<void> {
    try {
      const user = await this.userLookup.getUser(userId);
      if (isLoggedIn(user)) {
        await this.cache.delete(CacheKeys.account(user.accountName));
      }
    } catch (error) {
      logger.warn({ userId, error: errorMessage(error) }, 'Account lookup failed, skipping profile eviction');
    }
  }
}
