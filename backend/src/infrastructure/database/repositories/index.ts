import type { PgPool } from '../postgres.client.js';
import { PgCommentRepository } from './comment.repository.js';
import { PgPostRepository } from './post.repository.js';
import type { PhotoStore } from './repository.types.js';
import { PgUserRepository } from './user.repository.js';

export function createPgStore(pool: PgPool): PhotoStore {
  return {
    users: new PgUserRepository(pool),
    posts: new PgPostRepository(pool),
    comments: new PgCommentRepository(pool),
  };
}
