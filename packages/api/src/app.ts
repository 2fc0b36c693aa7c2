/**
 * Sync API application
 * Hono app exposing approval, sync and tracker operations
 */
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { isoNow } from '@meetsync/lib';
import type { AppConfig, SyncServices } from '@meetsync/crm-sync';
import { authMiddleware, API_SECRET_HEADER } from './middleware/auth';
import { loggingMiddleware, REQUEST_ID_HEADER } from './middleware/logging';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import {
  crmSyncRecordRoutes,
  hookRoutes,
  meetingRoutes,
  opportunityRoutes,
  syncRoutes,
  validationSessionRoutes,
} from './routes';
import type { AppEnv } from './types';

export const API_VERSION = '0.1.0';

export type AppOptions = Pick<AppConfig, 'environment' | 'apiSecret' | 'corsOrigins'>;

export function createApp(services: SyncServices, options: AppOptions) {
  const app = new Hono<AppEnv>();

  // ============================================================================
  // Global Middleware
  // ============================================================================

  app.use(
    '*',
    cors({
      origin: options.corsOrigins,
      allowMethods: ['GET', 'POST', 'PUT', 'OPTIONS'],
      allowHeaders: ['Content-Type', API_SECRET_HEADER, REQUEST_ID_HEADER],
      exposeHeaders: [REQUEST_ID_HEADER],
      credentials: true,
    })
  );

  // Request logging (dev)
  if (options.environment === 'development') {
    app.use('*', logger());
  }

  // Structured logging
  app.use('*', loggingMiddleware(services.logger));

  // ============================================================================
  // Public Routes
  // ============================================================================

  app.get('/health', (c) => {
    return c.json({
      status: 'healthy',
      version: API_VERSION,
      timestamp: isoNow(services.clock),
      services: {
        store: services.cache.backend,
        auth: options.apiSecret ? 'enabled' : 'disabled',
      },
    });
  });

  // External sync processes report back without the API secret
  app.route('/hooks', hookRoutes(services));

  // ============================================================================
  // Protected Routes (require API_SECRET)
  // ============================================================================

  app.use(
    '/api/*',
    authMiddleware({ secret: options.apiSecret, environment: options.environment, logger: services.logger })
  );

  app.route('/api/validation-sessions', validationSessionRoutes(services));
  app.route('/api/crm-sync-records', crmSyncRecordRoutes(services));
  app.route('/api/opportunities', opportunityRoutes(services));
  app.route('/api/meetings', meetingRoutes(services));
  app.route('/api/sync', syncRoutes(services));

  // ============================================================================
  // Error Handling
  // ============================================================================

  app.onError(errorHandler({ environment: options.environment, clock: services.clock, logger: services.logger }));
  app.notFound(notFoundHandler({ clock: services.clock }));

  return app;
}

export type SyncApiApp = ReturnType<typeof createApp>;
