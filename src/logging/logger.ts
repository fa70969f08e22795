/**
 * Base Logger Configuration
 *
 * Pino logger shared by the search client and the request scheduler.
 * Emits structured JSON; the level follows LOG_LEVEL, then NODE_ENV.
 */

import pino from 'pino';

/**
 * Log level mapping by environment
 */
const LOG_LEVELS = {
  development: 'debug',
  production: 'info',
  test: 'silent',
} as const;

function isKnownEnvironment(env: string): env is keyof typeof LOG_LEVELS {
  return env in LOG_LEVELS;
}

const NODE_ENV = process.env.NODE_ENV || 'development';
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (isKnownEnvironment(NODE_ENV) ? LOG_LEVELS[NODE_ENV] : 'info');

const loggerConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  // Basic-auth headers must never reach the log stream
  redact: ['apiKey', 'authorization', 'headers.Authorization'],
};

/**
 * Process-wide base logger.
 * Components derive their own child via createServiceLogger().
 */
export const logger = pino(loggerConfig);

export type Logger = typeof logger;

export { LOG_LEVEL, NODE_ENV };
