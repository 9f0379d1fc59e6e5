/**
 * PostgreSQL users table
 */

import type { User, UserId } from '@photofeed/shared';
import { ConflictError, StoreQueryFailedError } from '../../../application/errors.js';
import { runQuery, type PgPool } from '../postgres.client.js';
import type { UserRepository } from './repository.types.js';

interface UserRow {
  id: number;
  account_name: string;
  passhash: string;
  authority: number;
  del_flg: number;
  created_at: Date;
}

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
  const cause = error instanceof StoreQueryFailedError ? error.cause : undefined;
  return typeof cause === 'object' && cause !== null
    && 'code' in cause && cause.code === UNIQUE_VIOLATION;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    accountName: row.account_name,
    passhash: row.passhash,
    authority: row.authority,
    delFlg: row.del_flg,
    createdAt: row.created_at,
  };
}

export class PgUserRepository implements UserRepository {
  constructor(private readonly pool: PgPool) {}

  async findById(id: UserId): Promise<User | null> {
    const rows = await runQuery<UserRow>(this.pool, 'users.findById',
      'SELECT * FROM users WHERE id = $1', [id]);
    const row = rows[0];
    return row ? toUser(row) : null;
  }

  async findByIds(ids: readonly UserId[]): Promise<User[]> {
    if (ids.length === 0) {
      return [];
    }
    const rows = await runQuery<UserRow>(this.pool, 'users.findByIds',
      'SELECT * FROM users WHERE id = ANY($1::int[])', [ids]);
    return rows.map(toUser);
  }

  async findActiveByAccountName(accountName: string): Promise<User | null> {
    const rows = await runQuery<UserRow>(this.pool, 'users.findActiveByAccountName',
      'SELECT * FROM users WHERE account_name = $1 AND del_flg = 0', [accountName]);
    const row = rows[0];
    return row ? toUser(row) : null;
  }

  async existsByAccountName(accountName: string): Promise<boolean> {
    const rows = await runQuery<{ found: number }>(this.pool, 'users.existsByAccountName',
      'SELECT 1 AS found FROM users WHERE account_name = $1', [accountName]);
    return rows.length > 0;
  }

  /**
   * A concurrent registration of the same name loses on the unique index and
   * surfaces as ACCOUNT_NAME_TAKEN.
   */
  async create(accountName: string, passhash: string): Promise<UserId> {
    let rows: Array<{ id: number }>;
    try {
      rows = await runQuery<{ id: number }>(this.pool, 'users.create',
        'INSERT INTO users (account_name, passhash) VALUES ($1, $2) RETURNING id',
        [accountName, passhash]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Account name is already taken', 'ACCOUNT_NAME_TAKEN');
      }
      throw error;
    }
    const row = rows[0];
    if (!row) {
      throw new Error('INSERT INTO users returned no id');
    }
    return row.id;
  }

  async listBannable(): Promise<User[]> {
    const rows = await runQuery<UserRow>(this.pool, 'users.listBannable',
      'SELECT * FROM users WHERE authority = 0 AND del_flg = 0 ORDER BY created_at DESC');
    return rows.map(toUser);
  }

  async ban(id: UserId): Promise<void> {
    await runQuery(this.pool, 'users.ban',
      'UPDATE users SET del_flg = $1 WHERE id = $2', [1, id]);
  }
}
