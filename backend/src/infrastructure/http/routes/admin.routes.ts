/**
 * Moderation Routes
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { BanUsersRequest } from '@photofeed/shared';
import { assertCsrf, currentUser } from '../middleware/auth.middleware.js';
import { toPublicUser } from '../presenters.js';
import { errorResponseSchema, parseInput, rowIdSchema } from '../responses.js';
import { createLogger } from '../../logging/logger.js';
import type { RouteOptions } from './route.types.js';

const logger = createLogger('admin-routes');

const BanUsersSchema = z.object({
  csrfToken: z.string(),
  uids: z.array(rowIdSchema).min(1).max(1000),
});

export const adminRoutes: FastifyPluginAsync<RouteOptions> = async (
  fastify: FastifyInstance,
  { services, auth }
): Promise<void> => {
  const moderatorOnly = [auth.authenticateRequest, auth.requireModerator];

  // GET /admin/banned
  fastify.get('/banned', {
    schema: {
      tags: ['Admin'],
      summary: 'Accounts that can be banned',
      description: 'Active, non-moderator accounts, newest first.',
      security: [{ bearerAuth: [] }],
      response: {
        401: errorResponseSchema,
        403: errorResponseSchema,
      },
    },
    preHandler: moderatorOnly,
  }, async (_request, reply) => {
    const users = await services.moderation.listBannable();
    return reply.send({
      success: true,
      data: users.map(toPublicUser),
    });
  });

  // POST /admin/banned
  fastify.post('/banned', {
    schema: {
      tags: ['Admin'],
      summary: 'Ban accounts',
      security: [{ bearerAuth: [] }],
      body: {
        type: 'object',
        required: ['csrfToken', 'uids'],
        properties: {
          csrfToken: { type: 'string' },
          uids: { type: 'array', items: { type: 'number' } },
        },
      },
      response: {
        200: {
          type: 'object',
          properties: {
            success: { type: 'boolean' },
            data: {
              type: 'object',
              properties: {
                banned: { type: 'number' },
              },
            },
          },
        },
        400: errorResponseSchema,
        401: errorResponseSchema,
        403: errorResponseSchema,
        422: errorResponseSchema,
      },
    },
    preHandler: moderatorOnly,
  }, async (request, reply) => {
    const body: BanUsersRequest = parseInput(BanUsersSchema, request.body);
    assertCsrf(request, body.csrfToken);

    await services.moderation.banUsers(body.uids);
    logger.info({ moderatorId: currentUser(request).id, count: body.uids.length }, 'Accounts banned');

    return reply.send({
      success: true,
      data: { banned: body.uids.length },
    });
  });
};
