/**
 * Structured JSON logging with Pino.js
 *
 * Production: JSON format
 * Development: Pretty-printed for readability
 */

import { pino } from 'pino';
import type { Logger as PinoLogger, LoggerOptions } from 'pino';

const isDevelopment = process.env['NODE_ENV'] !== 'production';
const isTest = process.env['NODE_ENV'] === 'test';

const serviceName = process.env['SERVICE_NAME'];
const instanceId = process.env['HOSTNAME'];

// Build options conditionally to avoid undefined values with exactOptionalPropertyTypes
const loggerOptions: LoggerOptions = {
  level: isTest ? 'silent' : (process.env['LOG_LEVEL'] ?? 'info'),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Credentials must never reach the log stream
  redact: {
    paths: ['password', 'passhash', '*.password', '*.passhash', 'token', 'csrfToken'],
    censor: '[redacted]',
  },
  base: {
    env: process.env['NODE_ENV'] ?? 'development',
    ...(serviceName && { service: serviceName }),
    ...(instanceId && { instance: instanceId }),
  },
};

// Only add transport in development (not in production for JSON format)
if (isDevelopment && !isTest) {
  loggerOptions.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

const baseLogger = pino(loggerOptions);

export type Logger = PinoLogger;

export function createLogger(module: string): Logger {
  return baseLogger.child({ module });
}

/**
 * Error fields for log lines
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

