/**
 * Response envelope helpers
 */

import type { FastifyReply } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '../../application/errors.js';

/** Largest value of a PostgreSQL `integer` primary key */
export const MAX_ROW_ID = 2_147_483_647;

export const rowIdSchema = z.coerce.number().int().positive().max(MAX_ROW_ID);

export const errorResponseSchema = {
  type: 'object',
  properties: {
    success: { type: 'boolean' },
    error: {
      type: 'object',
      properties: {
        code: { type: 'string' },
        message: { type: 'string' },
      },
    },
  },
} as const;

export function sendNotFound(reply: FastifyReply, message: string): FastifyReply {
  return reply.status(404).send({
    success: false,
    error: {
      code: 'NOT_FOUND',
      message,
    },
  });
}

/**
 * Parses request input, turning the first zod issue into a 400
 */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const firstError = result.error.errors[0];
    const field = firstError && firstError.path.length > 0 ? `${firstError.path.join('.')}: ` : '';
    throw new ValidationError(`${field}${firstError?.message ?? 'Invalid request data'}`);
  }
  return result.data;
}
