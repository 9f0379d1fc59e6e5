/**
 * JWT Service
 * HS256 session tokens carrying the user id and the session's CSRF token
 */

import crypto from 'crypto';
import { z } from 'zod';
import type { UserId } from '@photofeed/shared';
import { createLogger } from '../../infrastructure/logging/logger.js';

const logger = createLogger('jwt-service');

export interface SessionPayload {
  userId: UserId;
  csrfToken: string;
}

interface JWTHeader {
  alg: string;
  typ: string;
}

interface JWTFullPayload extends SessionPayload {
  iat: number;
  exp: number;
}

function base64UrlEncode(data: string): string {
  return Buffer.from(data).toString('base64url');
}

function base64UrlDecode(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

const fullPayloadSchema = z.object({
  userId: z.number().int(),
  csrfToken: z.string(),
  iat: z.number(),
  exp: z.number(),
});

export class JwtService {
  constructor(
    private readonly secret: string,
    private readonly expiresInSeconds: number
  ) {}

  /**
   * Generate a JWT token
   */
  sign(payload: SessionPayload): string {
    const header: JWTHeader = {
      alg: 'HS256',
      typ: 'JWT',
    };

    const now = Math.floor(Date.now() / 1000);
    const fullPayload: JWTFullPayload = {
      ...payload,
      iat: now,
      exp: now + this.expiresInSeconds,
    };

    const encodedHeader = base64UrlEncode(JSON.stringify(header));
    const encodedPayload = base64UrlEncode(JSON.stringify(fullPayload));
    const signature = this.createSignature(`${encodedHeader}.${encodedPayload}`);

    return `${encodedHeader}.${encodedPayload}.${signature}`;
  }

  /**
   * Verify and decode a JWT token
   */
  verify(token: string): SessionPayload | null {
    const parts = token.split('.');
    if (parts.length !== 3) {
      logger.debug('Invalid JWT format');
      return null;
    }

    const [encodedHeader, encodedPayload, signature] = parts;
    if (!encodedHeader || !encodedPayload || !signature) {
      return null;
    }

    const expected = Buffer.from(this.createSignature(`${encodedHeader}.${encodedPayload}`));
    const actual = Buffer.from(signature);
    if (expected.length !== actual.length || !crypto.timingSafeEqual(expected, actual)) {
      logger.debug('Invalid JWT signature');
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(base64UrlDecode(encodedPayload));
    } catch (error) {
      logger.debug({ error }, 'JWT payload is not JSON');
      return null;
    }

    const parsed = fullPayloadSchema.safeParse(decoded);
    if (!parsed.success) {
      logger.debug('JWT payload has an unexpected shape');
      return null;
    }
    const payload = parsed.data;

    const now = Math.floor(Date.now() / 1000);
    if (payload.exp < now) {
      logger.debug({ exp: payload.exp, now }, 'JWT expired');
      return null;
    }

    return {
      userId: payload.userId,
      csrfToken: payload.csrfToken,
    };
  }

  private createSignature(data: string): string {
    return crypto
      .createHmac('sha256', this.secret)
      .update(data)
      .digest('base64url');
  }
}

/**
 * Extract token from Authorization header
 */
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader?.startsWith('Bearer ')) {
    return null;
  }
  return authHeader.slice(7);
}
