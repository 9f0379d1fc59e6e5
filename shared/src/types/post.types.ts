/**
 * Post and comment types.
 * Rows live in PostgreSQL; hydrated views are cached in Redis.
 */

import type { User, UserId } from './user.types.js';

export type PostId = number;
export type CommentId = number;

export type ImageMime = 'image/jpeg' | 'image/png' | 'image/gif';

/** Post row as selected for listing (image bytes live on disk) */
export interface PostRecord {
  readonly id: PostId;
  readonly userId: UserId;
  readonly body: string;
  readonly mime: string;
  readonly createdAt: Date;
}

/** Comment row */
export interface CommentRecord {
  readonly id: CommentId;
  readonly postId: PostId;
  readonly userId: UserId;
  readonly comment: string;
  readonly createdAt: Date;
}

/** Comment with its author attached */
export interface HydratedComment extends CommentRecord {
  readonly user: User;
}

/** Post with everything a feed or profile page renders */
export interface HydratedPost extends PostRecord {
  readonly commentCount: number;
  /** Oldest first */
  readonly comments: readonly HydratedComment[];
  readonly user: User;
  readonly csrfToken: string;
}

/** Everything the profile page needs, cached as one entry */
export interface ProfileAggregate {
  readonly user: User;
  readonly posts: readonly HydratedPost[];
  /** Comments written by the user */
  readonly commentCount: number;
  /** Posts owned by the user */
  readonly postCount: number;
  /** Comments received on the user's posts */
  readonly commentedCount: number;
}
