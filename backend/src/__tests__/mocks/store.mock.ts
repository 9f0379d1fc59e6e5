/**
 * In-memory PhotoStore
 * Same ordering and filtering as the SQL repositories. Every call is recorded
 * in `queries` so tests can count round trips.
 */

import type {
  CommentRecord,
  PostId,
  PostRecord,
  User,
  UserId,
} from '@photofeed/shared';
import type {
  CommentRepository,
  NewComment,
  NewPost,
  PhotoStore,
  PostRepository,
  UserRepository,
} from '../../infrastructure/database/repositories/repository.types.js';

const BASE_TIME = Date.parse('2024-01-01T00:00:00Z');

function newestFirst<T extends { id: number; createdAt: Date }>(a: T, b: T): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
}

export class InMemoryPhotoStore implements PhotoStore {
  readonly queries: string[] = [];
  private readonly userRows = new Map<UserId, User>();
  private readonly postRows = new Map<PostId, PostRecord>();
  private readonly commentRows: CommentRecord[] = [];
  private clock = 0;
  private failing = false;

  // Seeding helpers. Each new row is one second newer than the previous one.
  addUser(accountName: string, options: Partial<Pick<User, 'passhash' | 'authority' | 'delFlg'>> = {}): User {
    const user: User = {
      id: this.userRows.size + 1,
      accountName,
      passhash: options.passhash ?? '',
      authority: options.authority ?? 0,
      delFlg: options.delFlg ?? 0,
      createdAt: this.tick(),
    };
    this.userRows.set(user.id, user);
    return user;
  }

  addPost(userId: UserId, body = '', mime = 'image/png'): PostRecord {
    const post: PostRecord = {
      id: this.postRows.size + 1,
      userId,
      body,
      mime,
      createdAt: this.tick(),
    };
    this.postRows.set(post.id, post);
    return post;
  }

  addComment(postId: PostId, userId: UserId, comment: string): CommentRecord {
    const record: CommentRecord = {
      id: this.commentRows.length + 1,
      postId,
      userId,
      comment,
      createdAt: this.tick(),
    };
    this.commentRows.push(record);
    return record;
  }

  setBanned(userId: UserId): void {
    const user = this.userRows.get(userId);
    if (user) {
      this.userRows.set(userId, { ...user, delFlg: 1 });
    }
  }

  /** Every following query rejects */
  setFailing(failing: boolean): void {
    this.failing = failing;
  }

  countQueries(prefix: string): number {
    return this.queries.filter((query) => query.startsWith(prefix)).length;
  }

  resetQueries(): void {
    this.queries.length = 0;
  }

  readonly users: UserRepository = {
    findById: async (id) => {
      this.record('users.findById');
      return this.userRows.get(id) ?? null;
    },
    findByIds: async (ids) => {
      this.record('users.findByIds');
      const rows: User[] = [];
      for (const id of ids) {
        const user = this.userRows.get(id);
        if (user) rows.push(user);
      }
      return rows;
    },
    findActiveByAccountName: async (accountName) => {
      this.record('users.findActiveByAccountName');
      return [...this.userRows.values()]
        .find((user) => user.accountName === accountName && user.delFlg === 0) ?? null;
    },
    existsByAccountName: async (accountName) => {
      this.record('users.existsByAccountName');
      return [...this.userRows.values()].some((user) => user.accountName === accountName);
    },
    create: async (accountName, passhash) => {
      this.record('users.create');
      return this.addUser(accountName, { passhash }).id;
    },
    listBannable: async () => {
      this.record('users.listBannable');
      return [...this.userRows.values()]
        .filter((user) => user.authority === 0 && user.delFlg === 0)
        .sort(newestFirst);
    },
    ban: async (id) => {
      this.record('users.ban');
      this.setBanned(id);
    },
  };

  readonly posts: PostRepository = {
    listRecent: async (limit) => {
      this.record('posts.listRecent');
      return [...this.postRows.values()].sort(newestFirst).slice(0, limit);
    },
    listRecentBefore: async (maxCreatedAt, limit) => {
      this.record('posts.listRecentBefore');
      return [...this.postRows.values()]
        .filter((post) => post.createdAt.getTime() <= maxCreatedAt.getTime())
        .sort(newestFirst)
        .slice(0, limit);
    },
    listRecentByUser: async (userId, limit) => {
      this.record('posts.listRecentByUser');
      return [...this.postRows.values()]
        .filter((post) => post.userId === userId)
        .sort(newestFirst)
        .slice(0, limit);
    },
    findById: async (id) => {
      this.record('posts.findById');
      return this.postRows.get(id) ?? null;
    },
    listIdsByUser: async (userId) => {
      this.record('posts.listIdsByUser');
      return [...this.postRows.values()]
        .filter((post) => post.userId === userId)
        .map((post) => post.id);
    },
    create: async (post: NewPost) => {
      this.record('posts.create');
      return this.addPost(post.userId, post.body, post.mime).id;
    },
    findOwnerAccountName: async (postId) => {
      this.record('posts.findOwnerAccountName');
      const post = this.postRows.get(postId);
      return post ? this.userRows.get(post.userId)?.accountName ?? null : null;
    },
  };

  readonly comments: CommentRepository = {
    countByPostIds: async (postIds) => {
      this.record('comments.countByPostIds');
      const counts = new Map<PostId, number>();
      for (const comment of this.commentRows) {
        if (postIds.includes(comment.postId)) {
          counts.set(comment.postId, (counts.get(comment.postId) ?? 0) + 1);
        }
      }
      return counts;
    },
    listByPostIds: async (postIds) => {
      this.record('comments.listByPostIds');
      return this.commentRows
        .filter((comment) => postIds.includes(comment.postId))
        .sort(newestFirst);
    },
    countByUser: async (userId) => {
      this.record('comments.countByUser');
      return this.commentRows.filter((comment) => comment.userId === userId).length;
    },
    countOnPosts: async (postIds) => {
      this.record('comments.countOnPosts');
      return this.commentRows.filter((comment) => postIds.includes(comment.postId)).length;
    },
    create: async (comment: NewComment) => {
      this.record('comments.create');
      return this.addComment(comment.postId, comment.userId, comment.comment).id;
    },
  };

  private record(operation: string): void {
    this.queries.push(operation);
    if (this.failing) {
      throw new Error(`Store unavailable: ${operation}`);
    }
  }

  private tick(): Date {
    this.clock += 1;
    return new Date(BASE_TIME + this.clock * 1000);
  }
}
