/**
 * Authentication middleware for the sync API
 * Validates the X-Api-Secret header against the configured API secret
 */
import { createMiddleware } from 'hono/factory';
import { getLogger, type SyncLogger } from '@meetsync/crm-sync';
import type { AppEnv } from '../types';

export const API_SECRET_HEADER = 'X-Api-Secret';

export interface AuthOptions {
  /** Undefined disables auth in development and fails every request elsewhere */
  secret?: string;
  environment?: string;
  logger?: SyncLogger;
}

/**
 * Auth middleware factory
 * Validates requests have a valid X-Api-Secret header
 */
export function authMiddleware(options: AuthOptions) {
  const { secret, environment } = options;

  return createMiddleware<AppEnv>(async (c, next) => {
    if (!secret) {
      // In development, allow requests without auth if secret not configured
      if (environment === 'development') {
        (options.logger ?? getLogger()).warn('API_SECRET not configured - authentication disabled in development');
        await next();
        return;
      }
      return c.json(
        {
          success: false,
          error: 'Server configuration error',
          code: 'AUTH_CONFIG_ERROR',
        },
        500
      );
    }

    const providedSecret = c.req.header(API_SECRET_HEADER);

    if (!providedSecret) {
      return c.json(
        {
          success: false,
          error: `Missing ${API_SECRET_HEADER} header`,
          code: 'AUTH_MISSING',
        },
        401
      );
    }

    if (!secureCompare(providedSecret, secret)) {
      return c.json(
        {
          success: false,
          error: 'Invalid authentication token',
          code: 'AUTH_INVALID',
        },
        401
      );
    }

    await next();
  });
}

/**
 * Constant-time string comparison
 */
export function secureCompare(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }

  let result = 0;
  for (let i = 0; i < a.length; i++) {
    result |= a.charCodeAt(i) ^ b.charCodeAt(i);
  }

  return result === 0;
}
