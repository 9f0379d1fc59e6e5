/**
 * Authentication Middleware
 * Bearer JWT -> session -> user (through the user cache)
 */

import crypto from 'crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { User } from '@photofeed/shared';
import { extractBearerToken, type JwtService, type SessionPayload } from '../../../application/auth/jwt.service.js';
import { CsrfMismatchError, ForbiddenError, UnauthorizedError } from '../../../application/errors.js';
import { isBanned, isLoggedIn, isModerator, type UserLookup } from '../../../application/users/user-lookup.service.js';
import { createLogger } from '../../logging/logger.js';

const logger = createLogger('auth-middleware');

// Extend FastifyRequest to include session info
declare module 'fastify' {
  interface FastifyRequest {
    session?: SessionPayload;
    me?: User;
  }
}

export type PreHandler = (request: FastifyRequest, reply: FastifyReply) => Promise<void>;

export interface AuthHandlers {
  /** 401 unless a valid session of an active user is present */
  authenticateRequest: PreHandler;
  /** Attaches the session when present, never fails */
  optionalAuthentication: PreHandler;
  /** 403 for non-moderators; run after authenticateRequest */
  requireModerator: PreHandler;
}

export function createAuthHandlers(jwt: JwtService, userLookup: UserLookup): AuthHandlers {
  async function resolveSession(request: FastifyRequest): Promise<{ session: SessionPayload; me: User } | null> {
    const token = extractBearerToken(request.headers.authorization);
    if (!token) {
      return null;
    }

    const session = jwt.verify(token);
    if (!session) {
      return null;
    }

    const me = await userLookup.getUser(session.userId);
    if (!isLoggedIn(me) || isBanned(me)) {
      logger.debug({ userId: session.userId }, 'Session user missing or banned');
      return null;
    }
    return { session, me };
  }

  return {
    async authenticateRequest(request: FastifyRequest): Promise<void> {
      const resolved = await resolveSession(request);
      if (!resolved) {
        logger.debug({
          hasAuthHeader: !!request.headers.authorization,
        }, 'Authentication failed');
        throw new UnauthorizedError();
      }
      request.session = resolved.session;
      request.me = resolved.me;
    },

    async optionalAuthentication(request: FastifyRequest): Promise<void> {
      const resolved = await resolveSession(request);
      if (resolved) {
        request.session = resolved.session;
        request.me = resolved.me;
      }
    },

    async requireModerator(request: FastifyRequest): Promise<void> {
      const me = currentUser(request);
      if (!isModerator(me)) {
        logger.warn({ userId: me.id }, 'Insufficient permissions');
        throw new ForbiddenError();
      }
    },
  };
}

/**
 * The authenticated user; throws when authenticateRequest did not run
 */
export function currentUser(request: FastifyRequest): User {
  if (!request.me) {
    throw new UnauthorizedError('Authentication required');
  }
  return request.me;
}

/**
 * CSRF token of the current session, '' for anonymous requests
 */
export function sessionCsrfToken(request: FastifyRequest): string {
  return request.session?.csrfToken ?? '';
}

/**
 * Rejects a write whose form token differs from the session's
 */
export function assertCsrf(request: FastifyRequest, submitted: string): void {
  const expected = Buffer.from(sessionCsrfToken(request));
  const actual = Buffer.from(submitted);
  if (expected.length === 0 || expected.length !== actual.length || !crypto.timingSafeEqual(expected, actual)) {
    throw new CsrfMismatchError();
  }
}
