/**
 * Unit Tests: Auth Middleware
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { User } from '@photofeed/shared';
import { CsrfMismatchError, ForbiddenError, UnauthorizedError } from '../../application/errors.js';
import {
  assertCsrf,
  createAuthHandlers,
  currentUser,
  sessionCsrfToken,
  type AuthHandlers,
} from '../../infrastructure/http/middleware/auth.middleware.js';
import { createHarness, type TestHarness } from '../mocks/harness.js';

function createMockRequest(headers: Record<string, string | undefined> = {}) {
  return {
    headers,
    session: undefined,
    me: undefined,
  } as unknown as FastifyRequest;
}

const reply = {} as unknown as FastifyReply;

describe('Auth Middleware', () => {
  let h: TestHarness;
  let handlers: AuthHandlers;
  let alice: User;

  function bearer(user: User, csrfToken = 'csrf-1') {
    return { authorization: `Bearer ${h.services.jwt.sign({ userId: user.id, csrfToken })}` };
  }

  beforeEach(() => {
    h = createHarness();
    handlers = createAuthHandlers(h.services.jwt, h.services.userLookup);
    alice = h.store.addUser('alice');
  });

  describe('authenticateRequest', () => {
    it('should attach the session and user for a valid token', async () => {
      const request = createMockRequest(bearer(alice));

      await handlers.authenticateRequest(request, reply);

      expect(request.session).toEqual({ userId: alice.id, csrfToken: 'csrf-1' });
      expect(currentUser(request)).toEqual(alice);
      expect(sessionCsrfToken(request)).toBe('csrf-1');
    });

    it('should reject a request without credentials', async () => {
      await expect(handlers.authenticateRequest(createMockRequest(), reply))
        .rejects.toBeInstanceOf(UnauthorizedError);
    });

    it('should reject an invalid token', async () => {
      const request = createMockRequest({ authorization: 'Bearer not.a.token' });

      await expect(handlers.authenticateRequest(request, reply)).rejects.toBeInstanceOf(UnauthorizedError);
    });

    it('should reject the session of a banned user', async () => {
      h.store.setBanned(alice.id);

      await expect(handlers.authenticateRequest(createMockRequest(bearer(alice)), reply))
        .rejects.toBeInstanceOf(UnauthorizedError);
    });

    it('should reject the session of a deleted user', async () => {
      const ghost: User = { ...alice, id: 99 };

      await expect(handlers.authenticateRequest(createMockRequest(bearer(ghost)), reply))
        .rejects.toBeInstanceOf(UnauthorizedError);
    });
  });

  describe('optionalAuthentication', () => {
    it('should leave anonymous requests untouched', async () => {
      const request = createMockRequest();

      await handlers.optionalAuthentication(request, reply);

      expect(request.me).toBeUndefined();
      expect(sessionCsrfToken(request)).toBe('');
    });

    it('should attach a valid session', async () => {
      const request = createMockRequest(bearer(alice));

      await handlers.optionalAuthentication(request, reply);

      expect(request.me?.accountName).toBe('alice');
    });
  });

  describe('requireModerator', () => {
    it('should reject regular users', async () => {
      const request = createMockRequest(bearer(alice));
      await handlers.authenticateRequest(request, reply);

      await expect(handlers.requireModerator(request, reply)).rejects.toBeInstanceOf(ForbiddenError);
    });

    it('should let moderators through', async () => {
      const mod = h.store.addUser('mod', { authority: 1 });
      const request = createMockRequest(bearer(mod));
      await handlers.authenticateRequest(request, reply);

      await expect(handlers.requireModerator(request, reply)).resolves.toBeUndefined();
    });
  });

  describe('assertCsrf', () => {
    it('should accept the session token', async () => {
      const request = createMockRequest(bearer(alice, 'csrf-abc'));
      await handlers.authenticateRequest(request, reply);

      expect(() => assertCsrf(request, 'csrf-abc')).not.toThrow();
    });

    it('should reject a different token', async () => {
      const request = createMockRequest(bearer(alice, 'csrf-abc'));
      await handlers.authenticateRequest(request, reply);

      expect(() => assertCsrf(request, 'csrf-xyz')).toThrow(CsrfMismatchError);
    });

    it('should reject when there is no session', () => {
      expect(() => assertCsrf(createMockRequest(), '')).toThrow(CsrfMismatchError);
    });
  });
});
