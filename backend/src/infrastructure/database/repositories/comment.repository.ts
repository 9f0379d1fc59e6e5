/**
 * PostgreSQL comments table
 */

import type { CommentRecord, PostId, UserId } from '@photofeed/shared';
import { runQuery, type PgPool } from '../postgres.client.js';
import type { CommentRepository, NewComment } from './repository.types.js';

interface CommentRow {
  id: number;
  post_id: number;
  user_id: number;
  comment: string;
  created_at: Date;
}

function toComment(row: CommentRow): CommentRecord {
  return {
    id: row.id,
    postId: row.post_id,
    userId: row.user_id,
    comment: row.comment,
    createdAt: row.created_at,
  };
}

export class PgCommentRepository implements CommentRepository {
  constructor(private readonly pool: PgPool) {}

  async countByPostIds(postIds: readonly PostId[]): Promise<Map<PostId, number>> {
    const counts = new Map<PostId, number>();
    if (postIds.length === 0) {
      return counts;
    }
    const rows = await runQuery<{ post_id: number; count: number }>(this.pool, 'comments.countByPostIds',
      'SELECT post_id, COUNT(*)::int AS count FROM comments WHERE post_id = ANY($1::int[]) GROUP BY post_id',
      [postIds]);
    for (const row of rows) {
      counts.set(row.post_id, row.count);
    }
    return counts;
  }

  async listByPostIds(postIds: readonly PostId[]): Promise<CommentRecord[]> {
    if (postIds.length === 0) {
      return [];
    }
    const rows = await runQuery<CommentRow>(this.pool, 'comments.listByPostIds',
      'SELECT * FROM comments WHERE post_id = ANY($1::int[]) ORDER BY created_at DESC',
      [postIds]);
    return rows.map(toComment);
  }

  async countByUser(userId: UserId): Promise<number> {
    const rows = await runQuery<{ count: number }>(this.pool, 'comments.countByUser',
      'SELECT COUNT(*)::int AS count FROM comments WHERE user_id = $1', [userId]);
    return rows[0]?.count ?? 0;
  }

  async countOnPosts(postIds: readonly PostId[]): Promise<number> {
    if (postIds.length === 0) {
      return 0;
    }
    const rows = await runQuery<{ count: number }>(this.pool, 'comments.countOnPosts',
      'SELECT COUNT(*)::int AS count FROM comments WHERE post_id = ANY($1::int[])', [postIds]);
    return rows[0]?.count ?? 0;
  }

  async create(comment: NewComment): Promise<number> {
    const rows = await runQuery<{ id: number }>(this.pool, 'comments.create',
      'INSERT INTO comments (post_id, user_id, comment) VALUES ($1, $2, $3) RETURNING id',
      [comment.postId, comment.userId, comment.comment]);
    const row = rows[0];
    if (!row) {
      throw new Error('INSERT INTO comments returned no id');
    }
    return row.id;
  }
}
