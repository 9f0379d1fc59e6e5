/**
 * Health Check Routes
 * Provides system status for monitoring and load balancers
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { HealthCheckResponse, ServiceHealth } from '@photofeed/shared';
import { createLogger, errorMessage } from '../../logging/logger.js';
import type { RouteOptions } from './route.types.js';

const logger = createLogger('health-routes');

const serviceHealthSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['up', 'down', 'degraded'] },
    latencyMs: { type: 'number' },
  },
} as const;

const healthResponseSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['healthy', 'degraded', 'unhealthy'] },
    version: { type: 'string' },
    uptime: { type: 'number', description: 'Server uptime in seconds' },
    timestamp: { type: 'string', format: 'date-time' },
    services: {
      type: 'object',
      properties: {
        postgres: serviceHealthSchema,
        redis: serviceHealthSchema,
      },
    },
  },
} as const;

async function probe(name: string, check: () => Promise<void>): Promise<ServiceHealth> {
  const startedAt = Date.now();
  try {
    await check();
    return { status: 'up', latencyMs: Date.now() - startedAt };
  } catch (error) {
    logger.warn({ service: name, error: errorMessage(error) }, 'Health probe failed');
    return { status: 'down' };
  }
}

export const healthRoutes: FastifyPluginAsync<RouteOptions> = async (
  fastify: FastifyInstance,
  { services }
): Promise<void> => {
  // GET /health - Full health check
  fastify.get('/health', {
    schema: {
      tags: ['Health'],
      summary: 'System health check',
      description: 'PostgreSQL down means unhealthy; Redis down only degrades the service, reads fall back to the store.',
      response: {
        200: healthResponseSchema,
        503: healthResponseSchema,
      },
    },
  }, async (_request, reply) => {
    const [postgres, redis] = await Promise.all([
      probe('postgres', () => services.probes.postgres()),
      probe('redis', () => services.probes.redis()),
    ]);

    let status: HealthCheckResponse['status'] = 'healthy';
    if (postgres.status === 'down') {
      status = 'unhealthy';
    } else if (redis.status === 'down') {
      status = 'degraded';
    }

    const response: HealthCheckResponse = {
      status,
      version: '1.0.0',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      services: { postgres, redis },
    };

    return reply.status(status === 'unhealthy' ? 503 : 200).send(response);
  });

  // GET /ready - readiness probe
  fastify.get('/ready', {
    schema: {
      tags: ['Health'],
      summary: 'Readiness probe',
      response: {
        200: {
          type: 'object',
          properties: {
            ready: { type: 'boolean' },
          },
        },
      },
    },
  }, async (_request, reply) => {
    return reply.send({ ready: true });
  });

  // GET /live - liveness probe
  fastify.get('/live', {
    schema: {
      tags: ['Health'],
      summary: 'Liveness probe',
      response: {
        200: {
          type: 'object',
          properties: {
            live: { type: 'boolean' },
          },
        },
      },
    },
  }, async (_request, reply) => {
    return reply.send({ live: true });
  });
};
