/**
 * Moderation Service
 * Banning flips `del_flg`; the rows stay and are filtered out of every view.
 */

import type { User, UserId } from '@photofeed/shared';
import type { UserRepository } from '../../infrastructure/database/repositories/repository.types.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import type { InvalidationController } from '../feed/invalidation.service.js';

const logger = createLogger('moderation');

export class ModerationService {
  constructor(
    private readonly users: UserRepository,
    private readonly invalidation: InvalidationController
  ) {}

  /** Active, non-moderator accounts, newest first */
  async listBannable(): Promise<User[]> {
    return this.users.listBannable();
  }

  async banUsers(userIds: readonly UserId[]): Promise<void> {
    for (const userId of userIds) {
      await this.users.ban(userId);
      await this.invalidation.onUserBanned(userId);
      logger.info({ userId }, 'User banned');
    }
  }
}
