/**
 * Post Routes
 * Timeline, single posts, profiles and the two write endpoints
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { CreateCommentRequest, CreatePostRequest, WriteResponse } from '@photofeed/shared';
import { assertCsrf, currentUser, sessionCsrfToken } from '../middleware/auth.middleware.js';
import { toPostView, toProfileView } from '../presenters.js';
import { errorResponseSchema, parseInput, rowIdSchema, sendNotFound } from '../responses.js';
import { createLogger } from '../../logging/logger.js';
import type { RouteOptions } from './route.types.js';

const logger = createLogger('post-routes');

const TimelineQuerySchema = z.object({
  max_created_at: z.string().datetime({ offset: true }).optional(),
});

const PostParamsSchema = z.object({
  id: rowIdSchema,
});

const ProfileParamsSchema = z.object({
  accountName: z.string().regex(/^[0-9a-zA-Z_]+$/),
});

const CreatePostSchema = z.object({
  csrfToken: z.string(),
  contentType: z.string(),
  imageBase64: z.string(),
  body: z.string().max(10_000),
});

const CreateCommentSchema = z.object({
  csrfToken: z.string(),
  postId: rowIdSchema,
  comment: z.string().min(1).max(10_000),
});

const writeResponseSchema = {
  type: 'object',
  properties: {
    success: { type: 'boolean' },
    data: {
      type: 'object',
      properties: {
        postId: { type: 'number' },
      },
    },
  },
} as const;

export const postRoutes: FastifyPluginAsync<RouteOptions> = async (
  fastify: FastifyInstance,
  { services, auth }
): Promise<void> => {

  // GET /posts
  fastify.get('/posts', {
    schema: {
      tags: ['Posts'],
      summary: 'Timeline',
      description: 'Without max_created_at returns the cached home feed; with it, the page of posts created at or before that time.',
      querystring: {
        type: 'object',
        properties: {
          max_created_at: { type: 'string', description: 'ISO 8601 timestamp with offset' },
        },
      },
      response: {
        400: errorResponseSchema,
        404: errorResponseSchema,
      },
    },
    preHandler: auth.optionalAuthentication,
  }, async (request, reply) => {
    const query = parseInput(TimelineQuerySchema, request.query);
    const csrfToken = sessionCsrfToken(request);

    if (query.max_created_at === undefined) {
      const posts = await services.feed.getFeed(csrfToken);
      return reply.send({
        success: true,
        data: posts.map((post) => toPostView(post, csrfToken)),
      });
    }

    const posts = await services.feed.getPostsBefore(new Date(query.max_created_at), csrfToken);
    if (posts.length === 0) {
      return sendNotFound(reply, 'No older posts');
    }
    return reply.send({
      success: true,
      data: posts.map((post) => toPostView(post, csrfToken)),
    });
  });

  // GET /posts/:id
  fastify.get('/posts/:id', {
    schema: {
      tags: ['Posts'],
      summary: 'Single post with all comments',
      response: {
        404: errorResponseSchema,
      },
    },
    preHandler: auth.optionalAuthentication,
  }, async (request, reply) => {
    const params = PostParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendNotFound(reply, 'Post not found');
    }

    const csrfToken = sessionCsrfToken(request);
    const post = await services.feed.getPost(params.data.id, csrfToken);
    if (!post) {
      return sendNotFound(reply, 'Post not found');
    }
    return reply.send({
      success: true,
      data: toPostView(post, csrfToken),
    });
  });

  // POST /posts
  fastify.post('/posts', {
    schema: {
      tags: ['Posts'],
      summary: 'Create a post',
      description: 'The image is sent base64 encoded; its type is taken from contentType (jpeg, png or gif).',
      security: [{ bearerAuth: [] }],
      body: {
        type: 'object',
        required: ['csrfToken', 'contentType', 'imageBase64', 'body'],
        properties: {
          csrfToken: { type: 'string' },
          contentType: { type: 'string', description: 'e.g. image/png' },
          imageBase64: { type: 'string' },
          body: { type: 'string' },
        },
      },
      response: {
        201: writeResponseSchema,
        400: errorResponseSchema,
        401: errorResponseSchema,
        413: errorResponseSchema,
        422: errorResponseSchema,
      },
    },
    preHandler: auth.authenticateRequest,
  }, async (request, reply) => {
    const body: CreatePostRequest = parseInput(CreatePostSchema, request.body);
    assertCsrf(request, body.csrfToken);
    const me = currentUser(request);

    const postId = await services.posts.createPost(me, {
      contentType: body.contentType,
      image: Buffer.from(body.imageBase64, 'base64'),
      body: body.body,
    });

    const data: WriteResponse = { postId };
    return reply.status(201).send({ success: true, data });
  });

  // POST /comments
  fastify.post('/comments', {
    schema: {
      tags: ['Posts'],
      summary: 'Comment on a post',
      security: [{ bearerAuth: [] }],
      body: {
        type: 'object',
        required: ['csrfToken', 'postId', 'comment'],
        properties: {
          csrfToken: { type: 'string' },
          postId: { type: 'number' },
          comment: { type: 'string' },
        },
      },
      response: {
        201: writeResponseSchema,
        400: errorResponseSchema,
        401: errorResponseSchema,
        404: errorResponseSchema,
        422: errorResponseSchema,
      },
    },
    preHandler: auth.authenticateRequest,
  }, async (request, reply) => {
    const body: CreateCommentRequest = parseInput(CreateCommentSchema, request.body);
    assertCsrf(request, body.csrfToken);
    const me = currentUser(request);

    const postId = await services.posts.createComment(me, body.postId, body.comment);

    const data: WriteResponse = { postId };
    return reply.status(201).send({ success: true, data });
  });

  // GET /users/:accountName
  fastify.get('/users/:accountName', {
    schema: {
      tags: ['Posts'],
      summary: 'Profile page',
      description: 'Account details, recent posts and post/comment counters.',
      response: {
        404: errorResponseSchema,
      },
    },
    preHandler: auth.optionalAuthentication,
  }, async (request, reply) => {
    const params = ProfileParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendNotFound(reply, 'User not found');
    }

    const csrfToken = sessionCsrfToken(request);
    const profile = await services.feed.getProfile(params.data.accountName, csrfToken);
    if (!profile) {
      logger.debug({ accountName: params.data.accountName }, 'Profile not found');
      return sendNotFound(reply, 'User not found');
    }
    return reply.send({
      success: true,
      data: toProfileView(profile, csrfToken),
    });
  });
};
