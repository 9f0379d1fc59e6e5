/**
 * Unit Tests: PostgreSQL repositories
 * The pool is replaced by a recording fake; SQL text and parameters are asserted.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConflictError, StoreQueryFailedError } from '../../application/errors.js';
import type { PgPool } from '../../infrastructure/database/postgres.client.js';
import { createPgStore } from '../../infrastructure/database/repositories/index.js';
import type { PhotoStore } from '../../infrastructure/database/repositories/repository.types.js';

const createdAt = new Date('2024-03-01T12:00:00Z');

function createFakePool() {
  const query = vi.fn<(text: string, values: unknown[]) => Promise<{ rows: unknown[] }>>();
  query.mockResolvedValue({ rows: [] });
  return { query, pool: { query } as unknown as PgPool };
}

describe('PostgreSQL repositories', () => {
  let fake: ReturnType<typeof createFakePool>;
  let store: PhotoStore;

  beforeEach(() => {
    fake = createFakePool();
    store = createPgStore(fake.pool);
  });

  describe('users', () => {
    it('should map a row to a user', async () => {
      fake.query.mockResolvedValueOnce({
        rows: [{ id: 1, account_name: 'alice', passhash: 'h', authority: 0, del_flg: 0, created_at: createdAt }],
      });

      const user = await store.users.findById(1);

      expect(user).toEqual({ id: 1, accountName: 'alice', passhash: 'h', authority: 0, delFlg: 0, createdAt });
      expect(fake.query).toHaveBeenCalledWith('SELECT * FROM users WHERE id = $1', [1]);
    });

    it('should return null when no row matches', async () => {
      await expect(store.users.findById(9)).resolves.toBeNull();
    });

    it('should batch ids into one ANY query', async () => {
      await store.users.findByIds([1, 2, 3]);

      expect(fake.query).toHaveBeenCalledTimes(1);
      expect(fake.query).toHaveBeenCalledWith('SELECT * FROM users WHERE id = ANY($1::int[])', [[1, 2, 3]]);
    });

    it('should not query for an empty id list', async () => {
      await expect(store.users.findByIds([])).resolves.toEqual([]);
      expect(fake.query).not.toHaveBeenCalled();
    });

    it('should only find active accounts by name', async () => {
      await store.users.findActiveByAccountName('alice');

      expect(fake.query).toHaveBeenCalledWith(
        'SELECT * FROM users WHERE account_name = $1 AND del_flg = 0', ['alice']);
    });

    it('should return the id of a created user', async () => {
      fake.query.mockResolvedValueOnce({ rows: [{ id: 12 }] });

      await expect(store.users.create('alice', 'h')).resolves.toBe(12);
    });

    it('should report a duplicate account name as a conflict', async () => {
      fake.query.mockRejectedValueOnce(Object.assign(new Error('duplicate key value'), { code: '23505' }));

      const result = store.users.create('alice', 'h');

      await expect(result).rejects.toBeInstanceOf(ConflictError);
      await expect(result).rejects.toMatchObject({ statusCode: 409, code: 'ACCOUNT_NAME_TAKEN' });
    });

    it('should keep other insert failures as store errors', async () => {
      fake.query.mockRejectedValueOnce(Object.assign(new Error('connection reset'), { code: '08006' }));

      await expect(store.users.create('alice', 'h')).rejects.toBeInstanceOf(StoreQueryFailedError);
    });
  });

  describe('posts', () => {
    it('should select listing columns without image bytes', async () => {
      fake.query.mockResolvedValueOnce({
        rows: [{ id: 3, user_id: 1, body: 'b', mime: 'image/png', created_at: createdAt }],
      });

      const posts = await store.posts.listRecent(40);

      expect(posts).toEqual([{ id: 3, userId: 1, body: 'b', mime: 'image/png', createdAt }]);
      expect(fake.query).toHaveBeenCalledWith(
        'SELECT id, user_id, body, mime, created_at FROM posts ORDER BY created_at DESC LIMIT $1', [40]);
    });

    it('should resolve the owner account name through a join', async () => {
      fake.query.mockResolvedValueOnce({ rows: [{ account_name: 'alice' }] });

      await expect(store.posts.findOwnerAccountName(3)).resolves.toBe('alice');
    });

    it('should return null for the owner of a missing post', async () => {
      await expect(store.posts.findOwnerAccountName(404)).resolves.toBeNull();
    });

    it('should fail when the insert returns no id', async () => {
      await expect(store.posts.create({ userId: 1, mime: 'image/png', body: '' }))
        .rejects.toThrow('INSERT INTO posts returned no id');
    });
  });

  describe('comments', () => {
    it('should turn grouped counts into a map', async () => {
      fake.query.mockResolvedValueOnce({ rows: [{ post_id: 1, count: 4 }, { post_id: 3, count: 1 }] });

      const counts = await store.comments.countByPostIds([1, 2, 3]);

      expect([...counts.entries()]).toEqual([[1, 4], [3, 1]]);
    });

    it('should return zero without querying for no posts', async () => {
      await expect(store.comments.countOnPosts([])).resolves.toBe(0);
      expect(fake.query).not.toHaveBeenCalled();
    });

    it('should read a single count row', async () => {
      fake.query.mockResolvedValueOnce({ rows: [{ count: 7 }] });

      await expect(store.comments.countByUser(1)).resolves.toBe(7);
    });
  });

  describe('query failures', () => {
    it('should wrap driver errors in StoreQueryFailedError', async () => {
      const driverError = new Error('connection terminated');
      fake.query.mockRejectedValueOnce(driverError);

      const result = store.posts.findById(1);

      await expect(result).rejects.toBeInstanceOf(StoreQueryFailedError);
      await expect(result).rejects.toMatchObject({
        code: 'STORE_QUERY_FAILED',
        operation: 'posts.findById',
        cause: driverError,
      });
    });
  });
});
