/**
 * Serves stored post images
 */

import type { PostId } from '@photofeed/shared';
import type { PostRepository } from '../../infrastructure/database/repositories/repository.types.js';
import type { ImageExtension, ImageStorage } from '../../infrastructure/storage/image.storage.js';
import { extensionForMime } from './post-write.service.js';

export interface PostImage {
  readonly mime: string;
  readonly data: Buffer;
}

export class PostImageService {
  constructor(
    private readonly posts: PostRepository,
    private readonly images: ImageStorage
  ) {}

  /**
   * `null` unless the post exists, `ext` matches its mime type and the file is present
   */
  async getImage(postId: PostId, ext: ImageExtension): Promise<PostImage | null> {
    const post = await this.posts.findById(postId);
    if (!post || extensionForMime(post.mime) !== ext) {
      return null;
    }

    const data = await this.images.read(postId, ext);
    if (!data) {
      return null;
    }
    return { mime: post.mime, data };
  }
}
