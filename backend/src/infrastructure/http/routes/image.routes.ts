/**
 * Post image files: GET /image/<postId>.<jpg|png|gif>
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { ImageExtension } from '../../storage/image.storage.js';
import { MAX_ROW_ID, sendNotFound } from '../responses.js';
import type { RouteOptions } from './route.types.js';

const IMAGE_FILE_PATTERN = /^(\d+)\.(jpg|png|gif)$/;

function parseImageFile(file: string): { postId: number; ext: ImageExtension } | null {
  const match = IMAGE_FILE_PATTERN.exec(file);
  if (!match) {
    return null;
  }
  const [, id, ext] = match;
  if (id === undefined || (ext !== 'jpg' && ext !== 'png' && ext !== 'gif')) {
    return null;
  }
  const postId = Number(id);
  if (postId < 1 || postId > MAX_ROW_ID) {
    return null;
  }
  return { postId, ext };
}

export const imageRoutes: FastifyPluginAsync<RouteOptions> = async (
  fastify: FastifyInstance,
  { services }
): Promise<void> => {
  fastify.get<{ Params: { file: string } }>('/image/:file', {
    schema: {
      tags: ['Posts'],
      summary: 'Post image',
      params: {
        type: 'object',
        required: ['file'],
        properties: {
          file: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const parsed = parseImageFile(request.params.file);
    if (!parsed) {
      return sendNotFound(reply, 'Image not found');
    }

    const image = await services.postImages.getImage(parsed.postId, parsed.ext);
    if (!image) {
      return sendNotFound(reply, 'Image not found');
    }

    return reply
      .header('Content-Type', image.mime)
      .header('Cache-Control', 'public, max-age=86400')
      .send(image.data);
  });
};
