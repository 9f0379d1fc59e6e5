/**
 * Image storage on the local filesystem: `<imageDir>/<postId>.<ext>`
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import type { PostId } from '@photofeed/shared';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('image-storage');

export type ImageExtension = 'jpg' | 'png' | 'gif';

export interface ImageStorage {
  save(postId: PostId, ext: ImageExtension, data: Buffer): Promise<void>;
  /** `null` when no file exists */
  read(postId: PostId, ext: ImageExtension): Promise<Buffer | null>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileImageStorage implements ImageStorage {
  constructor(private readonly directory: string) {}

  async save(postId: PostId, ext: ImageExtension, data: Buffer): Promise<void> {
    await mkdir(this.directory, { recursive: true, mode: 0o755 });
    const filePath = this.pathFor(postId, ext);
    await writeFile(filePath, data, { mode: 0o644 });
    logger.debug({ postId, filePath, bytes: data.length }, 'Image saved');
  }

  async read(postId: PostId, ext: ImageExtension): Promise<Buffer | null> {
    try {
      return await readFile(this.pathFor(postId, ext));
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  private pathFor(postId: PostId, ext: ImageExtension): string {
    return path.join(this.directory, `${postId}.${ext}`);
  }
}
