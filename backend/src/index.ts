/**
 * Photo feed API process
 * Loads configuration, opens PostgreSQL and Redis through createServer and
 * serves until SIGINT or SIGTERM.
 */

import type { FastifyInstance } from 'fastify';
import { createServer } from './infrastructure/http/server.js';
import { createLogger } from './infrastructure/logging/logger.js';
import { loadConfig, validateConfig } from './config/index.js';

const logger = createLogger('main');

interface StartupFailure {
  message: string;
  stack?: string;
  code?: string;
}

function describeFailure(error: unknown): StartupFailure {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }
  const failure: StartupFailure = { message: error.message };
  if (error.stack) failure.stack = error.stack;
  if ('code' in error && typeof error.code === 'string') failure.code = error.code;
  return failure;
}

/**
 * Closing the server also closes the Redis client and the pg pool (onClose hook)
 */
function stopOnSignals(server: FastifyInstance): void {
  let stopping = false;

  const stop = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info({ signal }, 'Stopping photo feed API');

    try {
      await server.close();
      logger.info('Connections closed, exiting');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Could not close cleanly');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void stop('SIGINT'));
  process.on('SIGTERM', () => void stop('SIGTERM'));
  process.on('uncaughtException', (error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
    process.exit(1);
  });
  process.on('unhandledRejection', (reason) => {
    logger.fatal({ err: reason }, 'Unhandled rejection');
    process.exit(1);
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const problems = validateConfig(config);
  if (problems.length > 0) {
    logger.fatal({ errors: problems }, 'Refusing to start with invalid configuration');
    process.exit(1);
  }

  logger.info({
    env: config.env,
    port: config.server.port,
    imageDir: config.uploads.imageDir,
    feedTtlSeconds: config.cache.feedTtlSeconds,
  }, 'Starting photo feed API');

  const server = await createServer(config);
  await server.listen({ port: config.server.port, host: config.server.host });
  logger.info({ url: `http://${config.server.host}:${config.server.port}` }, 'Photo feed API listening');

  stopOnSignals(server);
}

main().catch((error: unknown) => {
  logger.fatal(describeFailure(error), 'Photo feed API failed to start');
  process.exit(1);
});
