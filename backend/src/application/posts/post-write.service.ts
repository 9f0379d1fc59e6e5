/**
 * Post Write Service
 * New posts and comments. Each write commits first, then evicts the cache
 * entries it staled.
 */

import type { ImageMime, PostId, User } from '@photofeed/shared';
import type { PhotoStore } from '../../infrastructure/database/repositories/repository.types.js';
import { createLogger, errorMessage } from '../../infrastructure/logging/logger.js';
import type { ImageExtension, ImageStorage } from '../../infrastructure/storage/image.storage.js';
import { NotFoundError, PayloadTooLargeError, ValidationError } from '../errors.js';
import type { InvalidationController } from '../feed/invalidation.service.js';

const logger = createLogger('post-write');

export interface ImageType {
  readonly mime: ImageMime;
  readonly ext: ImageExtension;
}

const JPEG: ImageType = { mime: 'image/jpeg', ext: 'jpg' };
const PNG: ImageType = { mime: 'image/png', ext: 'png' };
const GIF: ImageType = { mime: 'image/gif', ext: 'gif' };

/**
 * Image type from an upload's content type (`jpeg`, `png` or `gif` anywhere in it)
 */
export function detectImageType(contentType: string): ImageType | null {
  if (contentType.includes('jpeg')) {
    return JPEG;
  }
  if (contentType.includes('png')) {
    return PNG;
  }
  if (contentType.includes('gif')) {
    return GIF;
  }
  return null;
}

/**
 * Extension for a stored mime type, `null` for anything else
 */
export function extensionForMime(mime: string): ImageExtension | null {
  return [JPEG, PNG, GIF].find((type) => type.mime === mime)?.ext ?? null;
}

export interface NewPostInput {
  readonly contentType: string;
  readonly image: Buffer;
  readonly body: string;
}

export class PostWriteService {
  constructor(
    private readonly store: PhotoStore,
    private readonly images: ImageStorage,
    private readonly invalidation: InvalidationController,
    private readonly maxImageBytes: number
  ) {}

  async createPost(me: User, input: NewPostInput): Promise<PostId> {
    if (input.image.length === 0) {
      throw new ValidationError('An image is required', 'IMAGE_REQUIRED');
    }

    const type = detectImageType(input.contentType);
    if (!type) {
      throw new ValidationError('Only jpg, png and gif images can be posted', 'UNSUPPORTED_IMAGE');
    }

    if (input.image.length > this.maxImageBytes) {
      throw new PayloadTooLargeError('Image file is too large', 'IMAGE_TOO_LARGE');
    }

    const postId = await this.store.posts.create({
      userId: me.id,
      mime: type.mime,
      body: input.body,
    });

    // The row is already committed; a lost image leaves the post in place
    // with an image URL that answers 404.
    try {
      await this.images.save(postId, type.ext, input.image);
    } catch (error) {
      logger.error({ postId, userId: me.id, error: errorMessage(error) }, 'Image could not be stored');
    }
    await this.invalidation.onPostCreated(me.id);

    logger.info({ postId, userId: me.id, mime: type.mime }, 'Post created');
    return postId;
  }

  async createComment(me: User, postId: PostId, comment: string): Promise<PostId> {
    const post = await this.store.posts.findById(postId);
    if (!post) {
      throw new NotFoundError(`Post ${postId} not found`);
    }

    await this.store.comments.create({ postId, userId: me.id, comment });
    await this.invalidation.onCommentCreated(me.id, postId);

    logger.info({ postId, userId: me.id }, 'Comment created');
    return postId;
  }
}
