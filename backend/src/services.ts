/**
 * Service wiring
 * Every component is built once here and handed its collaborators explicitly.
 * Lifetimes equal the process lifetime.
 */

import type { Config } from './config/index.js';
import { ModerationService } from './application/admin/moderation.service.js';
import { AuthService } from './application/auth/auth.service.js';
import { JwtService } from './application/auth/jwt.service.js';
import { FeedAggregateCache } from './application/feed/feed-cache.service.js';
import { InvalidationController } from './application/feed/invalidation.service.js';
import { PostImageService } from './application/posts/post-image.service.js';
import { BatchPostAssembler } from './application/posts/post-assembler.service.js';
import { PostWriteService } from './application/posts/post-write.service.js';
import { UserLookup } from './application/users/user-lookup.service.js';
import type { CacheStore } from './infrastructure/cache/cache.store.js';
import type { PhotoStore } from './infrastructure/database/repositories/repository.types.js';
import type { ImageStorage } from './infrastructure/storage/image.storage.js';

/** Each probe resolves when its backend answers and rejects otherwise */
export interface HealthProbes {
  redis(): Promise<void>;
  postgres(): Promise<void>;
}

export interface Infrastructure {
  readonly cache: CacheStore;
  readonly store: PhotoStore;
  readonly images: ImageStorage;
  readonly probes: HealthProbes;
}

export interface AppServices {
  readonly jwt: JwtService;
  readonly auth: AuthService;
  readonly userLookup: UserLookup;
  readonly feed: FeedAggregateCache;
  readonly invalidation: InvalidationController;
  readonly posts: PostWriteService;
  readonly moderation: ModerationService;
  readonly postImages: PostImageService;
  readonly probes: HealthProbes;
}

export function createServices(config: Config, infra: Infrastructure): AppServices {
  const { cache, store, images, probes } = infra;

  const jwt = new JwtService(config.auth.jwtSecret, config.auth.jwtExpiresInSeconds);
  const userLookup = new UserLookup(cache, store.users, config.cache.userTtlSeconds);
  const assembler = new BatchPostAssembler(store.comments, userLookup, config.cache.pageSize);
  const feed = new FeedAggregateCache(cache, store, assembler, config.cache);
  const invalidation = new InvalidationController(cache, userLookup, store.posts);

  return {
    jwt,
    auth: new AuthService(store.users, jwt),
    userLookup,
    feed,
    invalidation,
    posts: new PostWriteService(store, images, invalidation, config.uploads.maxBytes),
    moderation: new ModerationService(store.users, invalidation),
    postImages: new PostImageService(store.posts, images),
    probes,
  };
}
