/**
 * Authentication Routes
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { CredentialsPayload, SessionResponse } from '@photofeed/shared';
import type { IssuedSession } from '../../../application/auth/auth.service.js';
import { currentUser } from '../middleware/auth.middleware.js';
import { toPublicUser } from '../presenters.js';
import { errorResponseSchema, parseInput } from '../responses.js';
import { createLogger } from '../../logging/logger.js';
import type { RouteOptions } from './route.types.js';

const logger = createLogger('auth-routes');

// Format rules live in AuthService; here only the shape is checked
const CredentialsSchema = z.object({
  accountName: z.string().max(64),
  password: z.string().max(128),
});

const credentialsBodySchema = {
  type: 'object',
  required: ['accountName', 'password'],
  properties: {
    accountName: { type: 'string', description: 'Letters, digits and underscore, at least 3 characters' },
    password: { type: 'string', description: 'Letters, digits and underscore, at least 6 characters' },
  },
} as const;

const userSchema = {
  type: 'object',
  properties: {
    id: { type: 'number' },
    accountName: { type: 'string' },
    authority: { type: 'number' },
    delFlg: { type: 'number' },
    createdAt: { type: 'string', format: 'date-time' },
  },
} as const;

const sessionResponseSchema = {
  type: 'object',
  properties: {
    success: { type: 'boolean' },
    data: {
      type: 'object',
      properties: {
        token: { type: 'string', description: 'Bearer token for authenticated requests' },
        csrfToken: { type: 'string', description: 'Token to echo back in write requests' },
        user: userSchema,
      },
    },
  },
} as const;

function toSessionResponse(session: IssuedSession): SessionResponse {
  return {
    token: session.token,
    csrfToken: session.csrfToken,
    user: toPublicUser(session.user),
  };
}

export const authRoutes: FastifyPluginAsync<RouteOptions> = async (
  fastify: FastifyInstance,
  { services, auth }
): Promise<void> => {

  // POST /auth/register
  fastify.post('/register', {
    schema: {
      tags: ['Auth'],
      summary: 'Create an account',
      description: 'Creates the account and returns a session for it.',
      body: credentialsBodySchema,
      response: {
        201: sessionResponseSchema,
        400: errorResponseSchema,
        409: errorResponseSchema,
      },
    },
  }, async (request, reply) => {
    const body: CredentialsPayload = parseInput(CredentialsSchema, request.body);
    const session = await services.auth.register(body.accountName, body.password);

    return reply.status(201).send({
      success: true,
      data: toSessionResponse(session),
    });
  });

  // POST /auth/login
  fastify.post('/login', {
    schema: {
      tags: ['Auth'],
      summary: 'Log in',
      description: 'Returns a new session for an active account.',
      body: credentialsBodySchema,
      response: {
        200: sessionResponseSchema,
        400: errorResponseSchema,
        401: errorResponseSchema,
      },
    },
  }, async (request, reply) => {
    const body: CredentialsPayload = parseInput(CredentialsSchema, request.body);
    const session = await services.auth.login(body.accountName, body.password);

    return reply.status(200).send({
      success: true,
      data: toSessionResponse(session),
    });
  });

  // GET /auth/me
  fastify.get('/me', {
    schema: {
      tags: ['Auth'],
      summary: 'Get current user',
      security: [{ bearerAuth: [] }],
      response: {
        200: {
          type: 'object',
          properties: {
            success: { type: 'boolean' },
            data: userSchema,
          },
        },
        401: errorResponseSchema,
      },
    },
    preHandler: auth.authenticateRequest,
  }, async (request, reply) => {
    const me = currentUser(request);
    logger.debug({ userId: me.id }, 'Current user requested');

    return reply.status(200).send({
      success: true,
      data: toPublicUser(me),
    });
  });
};
