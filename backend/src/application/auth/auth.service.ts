/**
 * Authentication Service
 * Registration, login and session issuance
 */

import crypto from 'crypto';
import type { User } from '@photofeed/shared';
import type { UserRepository } from '../../infrastructure/database/repositories/repository.types.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { ConflictError, UnauthorizedError, ValidationError } from '../errors.js';
import type { JwtService } from './jwt.service.js';
import { calculatePasshash, secureRandomString, validateCredentials } from './passhash.js';

const logger = createLogger('auth-service');

export interface IssuedSession {
  token: string;
  csrfToken: string;
  user: User;
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && crypto.timingSafeEqual(left, right);
}

export class AuthService {
  constructor(
    private readonly users: UserRepository,
    private readonly jwt: JwtService
  ) {}

  /**
   * Creates the account and logs it in. No user cache entry is written here;
   * the first session lookup populates it.
   */
  async register(accountName: string, password: string): Promise<IssuedSession> {
    if (!validateCredentials(accountName, password)) {
      throw new ValidationError(
        'Account name needs at least 3 characters and password at least 6 (letters, digits, underscore)',
        'INVALID_CREDENTIALS_FORMAT'
      );
    }

    if (await this.users.existsByAccountName(accountName)) {
      throw new ConflictError('Account name is already taken', 'ACCOUNT_NAME_TAKEN');
    }

    const passhash = calculatePasshash(accountName, password);
    const id = await this.users.create(accountName, passhash);
    logger.info({ userId: id, accountName }, 'New user registered');

    const user = await this.users.findById(id);
    if (!user) {
      throw new Error(`Registered user ${id} could not be read back`);
    }
    return this.issueSession(user);
  }

  /**
   * Only active (not banned) accounts can log in
   */
  async login(accountName: string, password: string): Promise<IssuedSession> {
    const user = await this.users.findActiveByAccountName(accountName);

    if (!user || !safeEqual(calculatePasshash(user.accountName, password), user.passhash)) {
      logger.warn({ accountName }, 'Login failed');
      throw new UnauthorizedError('Account name or password is incorrect');
    }

    logger.info({ userId: user.id }, 'User authenticated successfully');
    return this.issueSession(user);
  }

  private issueSession(user: User): IssuedSession {
    const csrfToken = secureRandomString(16);
    const token = this.jwt.sign({ userId: user.id, csrfToken });
    return { token, csrfToken, user };
  }
}
