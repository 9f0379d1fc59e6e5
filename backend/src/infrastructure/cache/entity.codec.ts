/**
 * Entity Codec
 * JSON wire shape of cache entries, validated with zod on the way back in.
 * A payload that fails to parse or validate is reported as `corrupt`, which
 * callers handle exactly like a miss.
 */

import { z } from 'zod';
import type {
  HydratedComment,
  HydratedPost,
  ProfileAggregate,
  User,
} from '@photofeed/shared';
import { createLogger, errorMessage } from '../logging/logger.js';
import type { CacheStore } from './cache.store.js';

const logger = createLogger('entity-codec');

export type CacheLookup<T> =
  | { readonly status: 'hit'; readonly value: T }
  | { readonly status: 'miss' }
  | { readonly status: 'corrupt'; readonly reason: string };

export interface EntityCodec<T> {
  encode(value: T): string;
  decode(raw: string | null): CacheLookup<T>;
}

const userSchema = z.object({
  id: z.number().int(),
  accountName: z.string(),
  passhash: z.string(),
  authority: z.number().int(),
  delFlg: z.number().int(),
  createdAt: z.coerce.date(),
});

const commentSchema = z.object({
  id: z.number().int(),
  postId: z.number().int(),
  userId: z.number().int(),
  comment: z.string(),
  createdAt: z.coerce.date(),
  user: userSchema,
});

const postSchema = z.object({
  id: z.number().int(),
  userId: z.number().int(),
  body: z.string(),
  mime: z.string(),
  createdAt: z.coerce.date(),
  commentCount: z.number().int().nonnegative(),
  comments: z.array(commentSchema),
  user: userSchema,
  csrfToken: z.string(),
});

const profileSchema = z.object({
  user: userSchema,
  posts: z.array(postSchema),
  commentCount: z.number().int().nonnegative(),
  postCount: z.number().int().nonnegative(),
  commentedCount: z.number().int().nonnegative(),
});

export function createCodec<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): EntityCodec<T> {
  return {
    encode(value: T): string {
      return JSON.stringify(value);
    },

    decode(raw: string | null): CacheLookup<T> {
      if (raw === null) {
        return { status: 'miss' };
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (error) {
        return { status: 'corrupt', reason: errorMessage(error) };
      }

      const result = schema.safeParse(parsed);
      if (!result.success) {
        const issue = result.error.issues[0];
        return {
          status: 'corrupt',
          reason: issue ? `${issue.path.join('.')}: ${issue.message}` : 'Schema mismatch',
        };
      }
      return { status: 'hit', value: result.data };
    },
  };
}

export const userCodec: EntityCodec<User> = createCodec(userSchema);
export const commentCodec: EntityCodec<HydratedComment> = createCodec(commentSchema);
export const postCodec: EntityCodec<HydratedPost> = createCodec(postSchema);
export const postListCodec: EntityCodec<HydratedPost[]> = createCodec(z.array(postSchema));
export const profileCodec: EntityCodec<ProfileAggregate> = createCodec(profileSchema);

/**
 * Cache get + decode. Only a hit returns a value.
 */
export async function readCached<T>(
  store: CacheStore,
  key: string,
  codec: EntityCodec<T>
): Promise<T | null> {
  const lookup = codec.decode(await store.get(key));

  switch (lookup.status) {
    case 'hit':
      return lookup.value;
    case 'corrupt':
      logger.warn({ key, reason: lookup.reason }, 'Corrupt cache entry, treating as miss');
      return null;
    case 'miss':
      return null;
  }
}

/**
 * Encode + cache set
 */
export async function writeCached<T>(
  store: CacheStore,
  key: string,
  codec: EntityCodec<T>,
  value: T,
  ttlSeconds: number
): Promise<void> {
  await store.set(key, codec.encode(value), ttlSeconds);
}
