/**
 * Response shapes. Password hashes never leave the service.
 */

import type {
  HydratedComment,
  HydratedPost,
  ProfileAggregate,
  PublicUser,
  User,
} from '@photofeed/shared';
import { extensionForMime } from '../../application/posts/post-write.service.js';
import { isBanned } from '../../application/users/user-lookup.service.js';

export interface CommentView extends Omit<HydratedComment, 'user'> {
  user: PublicUser;
}

export interface PostView extends Omit<HydratedPost, 'user' | 'comments'> {
  user: PublicUser;
  comments: CommentView[];
  imageUrl: string;
}

export interface ProfileView extends Omit<ProfileAggregate, 'user' | 'posts'> {
  user: PublicUser;
  posts: PostView[];
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    accountName: user.accountName,
    authority: user.authority,
    delFlg: user.delFlg,
    createdAt: user.createdAt,
  };
}

export function imageUrl(post: Pick<HydratedPost, 'id' | 'mime'>): string {
  const ext = extensionForMime(post.mime);
  return `/image/${post.id}${ext ? `.${ext}` : ''}`;
}

/**
 * Cached posts carry the token of whoever populated the cache; the view always
 * gets the current session's token. Comments by banned users are dropped here,
 * `commentCount` still counts them.
 */
export function toPostView(post: HydratedPost, csrfToken: string): PostView {
  return {
    id: post.id,
    userId: post.userId,
    body: post.body,
    mime: post.mime,
    createdAt: post.createdAt,
    commentCount: post.commentCount,
    comments: post.comments.filter((comment) => !isBanned(comment.user)).map((comment) => ({
      id: comment.id,
      postId: comment.postId,
      userId: comment.userId,
      comment: comment.comment,
      createdAt: comment.createdAt,
      user: toPublicUser(comment.user),
    })),
    user: toPublicUser(post.user),
    csrfToken,
    imageUrl: imageUrl(post),
  };
}

export function toProfileView(profile: ProfileAggregate, csrfToken: string): ProfileView {
  return {
    user: toPublicUser(profile.user),
    posts: profile.posts.map((post) => toPostView(post, csrfToken)),
    commentCount: profile.commentCount,
    postCount: profile.postCount,
    commentedCount: profile.commentedCount,
  };
}
