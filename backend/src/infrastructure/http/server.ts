/**
 * Fastify Server Configuration
 * buildApp wires plugins and routes around ready-made services; createServer
 * also opens the Redis and PostgreSQL connections behind them.
 */

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { Redis } from 'ioredis';
import type { Config } from '../../config/index.js';
import { AppError } from '../../application/errors.js';
import { createServices, type AppServices } from '../../services.js';
import { RedisCacheStore } from '../cache/cache.store.js';
import { closePgPool, createPgPool, type PgPool } from '../database/postgres.client.js';
import { closeRedisClient, createRedisClient } from '../database/redis.client.js';
import { createPgStore } from '../database/repositories/index.js';
import { createLogger, errorMessage } from '../logging/logger.js';
import { FileImageStorage } from '../storage/image.storage.js';
import { createAuthHandlers } from './middleware/auth.middleware.js';
import { adminRoutes } from './routes/admin.routes.js';
import { authRoutes } from './routes/auth.routes.js';
import { healthRoutes } from './routes/health.routes.js';
import { imageRoutes } from './routes/image.routes.js';
import { postRoutes } from './routes/post.routes.js';

const logger = createLogger('http-server');

/** Room for the JSON envelope around a base64 image */
const BODY_OVERHEAD_BYTES = 64 * 1024;

/**
 * Sleep for specified milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Connect to Redis with retries. The cache is optional: when every attempt
 * fails the server still starts and ioredis keeps reconnecting in the background.
 */
async function connectRedisWithRetry(redis: Redis, maxRetries = 5): Promise<void> {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      if (redis.status === 'wait') {
        await redis.connect();
      }
      const pingResult = await redis.ping();
      if (pingResult !== 'PONG') {
        throw new Error(`Redis ping failed: expected PONG, got ${pingResult}`);
      }
      logger.info('Redis connected');
      return;
    } catch (error) {
      logger.warn({ attempt, maxRetries, error: errorMessage(error) }, 'Redis connection attempt failed');
      if (attempt < maxRetries) {
        await sleep(2000);
      }
    }
  }
  logger.warn('Starting without Redis; reads go straight to PostgreSQL');
}

/**
 * Connect to PostgreSQL with retries
 */
async function connectPostgresWithRetry(pool: PgPool, maxRetries = 10): Promise<void> {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await pool.query('SELECT 1');
      logger.info('PostgreSQL connected');
      return;
    } catch (error) {
      const message = errorMessage(error);
      logger.warn({ attempt, maxRetries, error: message }, 'PostgreSQL connection attempt failed');

      if (attempt === maxRetries) {
        throw new Error(`PostgreSQL connection failed after ${maxRetries} attempts: ${message}`);
      }

      await sleep(2000);
    }
  }
}

function statusOf(error: FastifyError | AppError): number {
  return error.statusCode ?? 500;
}

/**
 * Operational AppErrors keep their message; driver failures and unexpected
 * 5xx errors do not.
 */
function isMaskable(error: FastifyError | AppError, statusCode: number): boolean {
  return error instanceof AppError ? !error.isOperational : statusCode >= 500;
}

/**
 * Fastify app around already-built services. Tests call this directly with
 * in-memory stores.
 */
export async function buildApp(config: Config, services: AppServices): Promise<FastifyInstance> {
  const server = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    connectionTimeout: 30000,
    keepAliveTimeout: 10000,
    maxParamLength: 100,
    bodyLimit: Math.ceil(config.uploads.maxBytes * 4 / 3) + BODY_OVERHEAD_BYTES,
  });

  // Swagger/OpenAPI documentation
  await server.register(swagger, {
    openapi: {
      info: {
        title: 'Photo Feed API',
        description: 'Photo sharing timeline with a read-through Redis cache',
        version: '1.0.0',
      },
      servers: [
        { url: `http://localhost:${config.server.port}`, description: 'Development' },
      ],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: 'http',
            scheme: 'bearer',
            bearerFormat: 'JWT',
          },
        },
      },
      tags: [
        { name: 'Posts', description: 'Timeline, posts, comments and profiles' },
        { name: 'Auth', description: 'Registration and login' },
        { name: 'Admin', description: 'Moderation' },
        { name: 'Health', description: 'Health check endpoints' },
      ],
    },
  });

  await server.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
  });

  // Security middleware
  await server.register(helmet, {
    contentSecurityPolicy: false, // Disable for API-only server
  });

  await server.register(cors, {
    origin: config.env === 'production' ? false : true,
    credentials: true,
  });

  await server.register(rateLimit, {
    global: true,
    max: 1000,
    timeWindow: '1 minute',
    errorResponseBuilder: () =>
      new AppError('Too many requests, please slow down', 429, 'RATE_LIMIT_EXCEEDED'),
  });

  server.addHook('onRequest', async (request) => {
    logger.debug({
      method: request.method,
      url: request.url,
      requestId: request.id,
    }, 'Incoming request');
  });

  server.addHook('onResponse', async (request, reply) => {
    // Images are served on every page view
    if (!request.url.startsWith('/image/') || config.env !== 'production') {
      logger.info({
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
        requestId: request.id,
      }, 'Request completed');
    }
  });

  // Error handler
  server.setErrorHandler((error: FastifyError | AppError, request, reply) => {
    const statusCode = statusOf(error);
    const isServerError = statusCode >= 500;

    if (isServerError) {
      logger.error({
        error: error.message,
        stack: error.stack,
        cause: error.cause instanceof Error ? error.cause.message : undefined,
        requestId: request.id,
      }, 'Request error');
    } else {
      logger.debug({ error: error.message, statusCode, requestId: request.id }, 'Request rejected');
    }

    let code = error.code;
    if (!(error instanceof AppError) && error.validation) {
      code = 'VALIDATION_ERROR';
    }

    void reply.status(statusCode).send({
      success: false,
      error: {
        code: code || 'INTERNAL_ERROR',
        message: config.env === 'production' && isMaskable(error, statusCode)
          ? 'An internal error occurred'
          : error.message,
      },
    });
  });

  const auth = createAuthHandlers(services.jwt, services.userLookup);

  // Register routes
  await server.register(healthRoutes, { prefix: '/api', services, auth });
  await server.register(authRoutes, { prefix: '/api/auth', services, auth });
  await server.register(postRoutes, { prefix: '/api', services, auth });
  await server.register(adminRoutes, { prefix: '/api/admin', services, auth });
  await server.register(imageRoutes, { services, auth });

  logger.info('Routes registered');
  return server;
}

/**
 * Production server: real Redis, PostgreSQL and image directory. Both
 * connections are closed with the server.
 */
export async function createServer(config: Config): Promise<FastifyInstance> {
  const redis = createRedisClient(config);
  const pool = createPgPool(config);

  await connectRedisWithRetry(redis);
  await connectPostgresWithRetry(pool);

  const services = createServices(config, {
    cache: new RedisCacheStore(redis, config.cache.timeoutMs),
    store: createPgStore(pool),
    images: new FileImageStorage(config.uploads.imageDir),
    probes: {
      async redis() {
        await redis.ping();
      },
      async postgres() {
        await pool.query('SELECT 1');
      },
    },
  });

  const server = await buildApp(config, services);

  server.addHook('onClose', async () => {
    await closeRedisClient(redis);
    await closePgPool(pool);
  });

  return server;
}
