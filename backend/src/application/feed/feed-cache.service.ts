/**
 * Feed Aggregate Cache
 * Read paths for the home feed and profile pages, each cached as one entry
 * with a short TTL. Entries are evicted by InvalidationController on writes.
 */

import type { HydratedPost, PostId, ProfileAggregate } from '@photofeed/shared';
import type { CacheConfig } from '../../config/index.js';
import type { CacheStore } from '../../infrastructure/cache/cache.store.js';
import {
  postListCodec,
  profileCodec,
  readCached,
  writeCached,
} from '../../infrastructure/cache/entity.codec.js';
import { CacheKeys } from '../../infrastructure/database/redis.client.js';
import type { PhotoStore } from '../../infrastructure/database/repositories/repository.types.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import type { BatchPostAssembler } from '../posts/post-assembler.service.js';

const logger = createLogger('feed-cache');

export type FeedCacheSettings = Pick<
  CacheConfig,
  'candidateLimit' | 'feedTtlSeconds' | 'profileTtlSeconds'
>;

export class FeedAggregateCache {
  constructor(
    private readonly cache: CacheStore,
    private readonly store: PhotoStore,
    private readonly assembler: BatchPostAssembler,
    private readonly settings: FeedCacheSettings
  ) {}

  /**
   * Home feed. One shared entry for every viewer; the embedded CSRF token is
   * the one of the request that populated it.
   */
  async getFeed(csrfToken: string): Promise<HydratedPost[]> {
    const key = CacheKeys.indexPosts();
    const cached = await readCached(this.cache, key, postListCodec);
    if (cached) {
      return cached;
    }

    const candidates = await this.store.posts.listRecent(this.settings.candidateLimit);
    const posts = await this.assembler.assemble(candidates, csrfToken, false);

    if (posts.length > 0) {
      await writeCached(this.cache, key, postListCodec, posts, this.settings.feedTtlSeconds);
    }
    logger.debug({ posts: posts.length }, 'Home feed loaded from store');
    return posts;
  }

  /**
   * Profile page aggregate. `null` when no active account has this name.
   */
  async getProfile(accountName: string, csrfToken: string): Promise<ProfileAggregate | null> {
    const key = CacheKeys.account(accountName);
    const cached = await readCached(this.cache, key, profileCodec);
    if (cached && cached.user.id !== 0) {
      return cached;
    }

    const user = await this.store.users.findActiveByAccountName(accountName);
    if (!user) {
      return null;
    }

    const candidates = await this.store.posts.listRecentByUser(user.id, this.settings.candidateLimit);
    const posts = await this.assembler.assemble(candidates, csrfToken, false);
    const commentCount = await this.store.comments.countByUser(user.id);
    const postIds = await this.store.posts.listIdsByUser(user.id);
    const commentedCount = await this.store.comments.countOnPosts(postIds);

    const profile: ProfileAggregate = {
      user,
      posts,
      commentCount,
      postCount: postIds.length,
      commentedCount,
    };

    await writeCached(this.cache, key, profileCodec, profile, this.settings.profileTtlSeconds);
    logger.debug({ accountName, posts: posts.length }, 'Profile loaded from store');
    return profile;
  }

  /**
   * Timeline page older than or equal to `maxCreatedAt`. Not cached.
   */
  async getPostsBefore(maxCreatedAt: Date, csrfToken: string): Promise<HydratedPost[]> {
    const candidates = await this.store.posts.listRecentBefore(maxCreatedAt, this.settings.candidateLimit);
    return this.assembler.assemble(candidates, csrfToken, false);
  }

  /**
   * Single post with every comment. `null` when missing or its author is banned.
   */
  async getPost(id: PostId, csrfToken: string): Promise<HydratedPost | null> {
    const post = await this.store.posts.findById(id);
    if (!post) {
      return null;
    }
    const [hydrated] = await this.assembler.assemble([post], csrfToken, true);
    return hydrated ?? null;
  }
}
