/**
 * Relational store contracts
 * Every method is one round trip and rejects with StoreQueryFailedError.
 */

import type {
  CommentRecord,
  PostId,
  PostRecord,
  User,
  UserId,
} from '@photofeed/shared';

export interface UserRepository {
  findById(id: UserId): Promise<User | null>;
  /** One `IN` query; ids without a row are left out */
  findByIds(ids: readonly UserId[]): Promise<User[]>;
  findActiveByAccountName(accountName: string): Promise<User | null>;
  existsByAccountName(accountName: string): Promise<boolean>;
  create(accountName: string, passhash: string): Promise<UserId>;
  /** Active, non-moderator accounts, newest first */
  listBannable(): Promise<User[]>;
  ban(id: UserId): Promise<void>;
}

export interface NewPost {
  readonly userId: UserId;
  readonly mime: string;
  readonly body: string;
}

export interface PostRepository {
  /** Newest first */
  listRecent(limit: number): Promise<PostRecord[]>;
  /** Newest first, `created_at <= maxCreatedAt` */
  listRecentBefore(maxCreatedAt: Date, limit: number): Promise<PostRecord[]>;
  /** Newest first */
  listRecentByUser(userId: UserId, limit: number): Promise<PostRecord[]>;
  findById(id: PostId): Promise<PostRecord | null>;
  listIdsByUser(userId: UserId): Promise<PostId[]>;
  create(post: NewPost): Promise<PostId>;
  /** Account name of the post owner, via a join */
  findOwnerAccountName(postId: PostId): Promise<string | null>;
}

export interface NewComment {
  readonly postId: PostId;
  readonly userId: UserId;
  readonly comment: string;
}

export interface CommentRepository {
  /** `COUNT(*) GROUP BY post_id`; posts without comments are absent */
  countByPostIds(postIds: readonly PostId[]): Promise<Map<PostId, number>>;
  /** All comments of the given posts, newest first */
  listByPostIds(postIds: readonly PostId[]): Promise<CommentRecord[]>;
  countByUser(userId: UserId): Promise<number>;
  /** Total comments across the given posts */
  countOnPosts(postIds: readonly PostId[]): Promise<number>;
  create(comment: NewComment): Promise<number>;
}

export interface PhotoStore {
  readonly users: UserRepository;
  readonly posts: PostRepository;
  readonly comments: CommentRepository;
}
