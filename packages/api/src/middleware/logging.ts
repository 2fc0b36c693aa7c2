/**
 * Structured logging middleware for the sync API
 * Writes request start/complete lines through the sync logger
 */
import { createMiddleware } from 'hono/factory';
import { getLogger, type SyncLogger } from '@meetsync/crm-sync';
import type { AppEnv } from '../types';

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Generate a short request ID
 */
function generateRequestId(): string {
  return Math.random().toString(36).substring(2, 10);
}

/**
 * Structured logging middleware factory
 * Reuses an incoming x-request-id and echoes it on the response.
 */
export function loggingMiddleware(logger: SyncLogger = getLogger()) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const requestId = c.req.header(REQUEST_ID_HEADER) ?? generateRequestId();
    const timer = logger.startTimer();

    c.set('requestId', requestId);
    c.header(REQUEST_ID_HEADER, requestId);

    logger.debug('request_start', {
      method: c.req.method,
      path: c.req.path,
      request_id: requestId,
    });

    await next();

    const status = c.res.status;
    const entry = {
      method: c.req.method,
      path: c.req.path,
      status,
      duration_ms: timer(),
      request_id: requestId,
    };
    if (status >= 500) {
      logger.warn('request_complete', entry);
    } else {
      logger.info('request_complete', entry);
    }
  });
}
