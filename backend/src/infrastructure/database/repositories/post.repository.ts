/**
 * PostgreSQL posts table
 * `imgdata` is never selected; images are served from disk.
 */

import type { PostId, PostRecord, UserId } from '@photofeed/shared';
import { runQuery, type PgPool } from '../postgres.client.js';
import type { NewPost, PostRepository } from './repository.types.js';

interface PostRow {
  id: number;
  user_id: number;
  body: string;
  mime: string;
  created_at: Date;
}

const POST_COLUMNS = 'id, user_id, body, mime, created_at';

function toPost(row: PostRow): PostRecord {
  return {
    id: row.id,
    userId: row.user_id,
    body: row.body,
    mime: row.mime,
    createdAt: row.created_at,
  };
}

export class PgPostRepository implements PostRepository {
  constructor(private readonly pool: PgPool) {}

  async listRecent(limit: number): Promise<PostRecord[]> {
    const rows = await runQuery<PostRow>(this.pool, 'posts.listRecent',
      `SELECT ${POST_COLUMNS} FROM posts ORDER BY created_at DESC LIMIT $1`, [limit]);
    return rows.map(toPost);
  }

  async listRecentBefore(maxCreatedAt: Date, limit: number): Promise<PostRecord[]> {
    const rows = await runQuery<PostRow>(this.pool, 'posts.listRecentBefore',
      `SELECT ${POST_COLUMNS} FROM posts WHERE created_at <= $1 ORDER BY created_at DESC LIMIT $2`,
      [maxCreatedAt, limit]);
    return rows.map(toPost);
  }

  async listRecentByUser(userId: UserId, limit: number): Promise<PostRecord[]> {
    const rows = await runQuery<PostRow>(this.pool, 'posts.listRecentByUser',
      `SELECT ${POST_COLUMNS} FROM posts WHERE user_id = $1 ORDER BY created_at DESC LIMIT $2`,
      [userId, limit]);
    return rows.map(toPost);
  }

  async findById(id: PostId): Promise<PostRecord | null> {
    const rows = await runQuery<PostRow>(this.pool, 'posts.findById',
      `SELECT ${POST_COLUMNS} FROM posts WHERE id = $1`, [id]);
    const row = rows[0];
    return row ? toPost(row) : null;
  }

  async listIdsByUser(userId: UserId): Promise<PostId[]> {
    const rows = await runQuery<{ id: number }>(this.pool, 'posts.listIdsByUser',
      'SELECT id FROM posts WHERE user_id = $1', [userId]);
    return rows.map((row) => row.id);
  }

  async create(post: NewPost): Promise<PostId> {
    const rows = await runQuery<{ id: number }>(this.pool, 'posts.create',
      'INSERT INTO posts (user_id, mime, imgdata, body) VALUES ($1, $2, $3, $4) RETURNING id',
      [post.userId, post.mime, Buffer.alloc(0), post.body]);
    const row = rows[0];
    if (!row) {
      throw new Error('INSERT INTO posts returned no id');
    }
    return row.id;
  }

  async findOwnerAccountName(postId: PostId): Promise<string | null> {
    const rows = await runQuery<{ account_name: string }>(this.pool, 'posts.findOwnerAccountName',
      'SELECT u.account_name FROM posts p JOIN users u ON p.user_id = u.id WHERE p.id = $1',
      [postId]);
    return rows[0]?.account_name ?? null;
  }
}
