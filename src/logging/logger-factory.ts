/**
 * Logger Factory
 *
 * Creates component-scoped Pino child loggers and the shared
 * logging patterns used by clients and the scheduler.
 */

import type pino from 'pino';
import { logger as baseLogger } from './logger.js';

/**
 * Logger bound to a single component (`service` field)
 */
export type ServiceLogger = pino.Logger;

/**
 * Create a component-specific logger
 *
 * @param serviceName - Component name (e.g. 'SearchApiClient', 'SearchScheduler')
 *
 * @example
 * ```typescript
 * const logger = createServiceLogger('SearchApiClient');
 * logger.info('Client initialized');
 * // {"level":"info","service":"SearchApiClient","msg":"Client initialized"}
 * ```
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  return baseLogger.child({ service: serviceName });
}

export const LogPatterns = {
  /**
   * Method entry (debug level)
   */
  methodEntry: (
    logger: ServiceLogger,
    method: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ method, params }, `Entering ${method}`);
  },

  /**
   * Method exit (debug level). Keep `result` to a summary, never a full payload.
   */
  methodExit: (
    logger: ServiceLogger,
    method: string,
    result?: Record<string, unknown>
  ) => {
    logger.debug({ method, result }, `Exiting ${method}`);
  },

  /**
   * Method failure (error level)
   *
   * @example
   * ```typescript
   * log.methodError(logger, 'execute', error, { field: 'email' });
   * // {"level":"error","service":"...","method":"execute","error":"...","errorName":"SearchApiError","field":"email","msg":"Error in execute"}
   * ```
   */
  methodError: (
    logger: ServiceLogger,
    method: string,
    error: Error,
    context: Record<string, unknown> = {}
  ) => {
    logger.error(
      {
        method,
        error: error.message,
        errorName: error.name,
        stack: error.stack,
        ...context,
      },
      `Error in ${method}`
    );
  },

  /**
   * Outbound API call (debug level)
   */
  externalApiCall: (
    logger: ServiceLogger,
    api: string,
    endpoint: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ api, endpoint, params }, `External API call: ${api}`);
  },
};

/**
 * Short alias for LogPatterns
 */
export const log = LogPatterns;
