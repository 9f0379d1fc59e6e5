/**
 * Batch Post Assembler
 * Hydrates a page of candidate posts with comment counts, comments and authors.
 *
 * Store round trips per call, independent of the number of candidates:
 *   1. comment counts (GROUP BY post_id)
 *   2. comment bodies, newest first
 *   3. users missing from the cache (one IN query)
 */

import type {
  CommentRecord,
  HydratedComment,
  HydratedPost,
  PostId,
  PostRecord,
  User,
  UserId,
} from '@photofeed/shared';
import type { CommentRepository } from '../../infrastructure/database/repositories/repository.types.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { isBanned, ZERO_USER, type UserLookup } from '../users/user-lookup.service.js';

const logger = createLogger('post-assembler');

/** Comments shown under a post in list views */
export const COMMENT_PREVIEW_SIZE = 3;

export class BatchPostAssembler {
  constructor(
    private readonly comments: CommentRepository,
    private readonly userLookup: UserLookup,
    private readonly pageSize: number
  ) {}

  /**
   * Candidates are filtered by author ban in input order and capped at the page
   * size in the same pass, so banned posts near the top can leave a page short
   * even when eligible candidates remain further down.
   */
  async assemble(
    candidates: readonly PostRecord[],
    csrfToken: string,
    includeAllComments: boolean
  ): Promise<HydratedPost[]> {
    if (candidates.length === 0) {
      return [];
    }

    const postIds: PostId[] = [];
    const userIds = new Set<UserId>();
    for (const post of candidates) {
      postIds.push(post.id);
      userIds.add(post.userId);
    }

    const commentCounts = await this.comments.countByPostIds(postIds);

    const allComments = await this.comments.listByPostIds(postIds);
    const commentsByPost = new Map<PostId, CommentRecord[]>();
    for (const comment of allComments) {
      const list = commentsByPost.get(comment.postId);
      if (list) {
        list.push(comment);
      } else {
        commentsByPost.set(comment.postId, [comment]);
      }
      userIds.add(comment.userId);
    }

    const users = await this.userLookup.getUsers(userIds);
    const userOf = (id: UserId): User => users.get(id) ?? ZERO_USER;

    const posts: HydratedPost[] = [];
    for (const post of candidates) {
      const newestFirst = commentsByPost.get(post.id) ?? [];
      const kept = includeAllComments
        ? newestFirst
        : newestFirst.slice(0, COMMENT_PREVIEW_SIZE);

      const comments: HydratedComment[] = kept
        .map((comment) => ({ ...comment, user: userOf(comment.userId) }))
        .reverse();

      const hydrated: HydratedPost = {
        ...post,
        commentCount: commentCounts.get(post.id) ?? 0,
        comments,
        user: userOf(post.userId),
        csrfToken,
      };

      if (!isBanned(hydrated.user)) {
        posts.push(hydrated);
      }
      if (posts.length >= this.pageSize) {
        break;
      }
    }

    logger.debug({
      candidates: candidates.length,
      returned: posts.length,
      users: users.size,
    }, 'Assembled posts');

    return posts;
  }
}
