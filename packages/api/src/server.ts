/**
 * Sync API server entry point
 * Serves the Hono app on Node.js
 */
import { serve } from '@hono/node-server';
import { createSyncServices, getErrorMessage, loadConfig } from '@meetsync/crm-sync';
import { createApp } from './app';

// ===========================================
// Main Server
// ===========================================

function main(): void {
  const config = loadConfig();
  const services = createSyncServices(config);
  const app = createApp(services, config);

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    services.logger.info('server_started', {
      port: info.port,
      environment: config.environment,
      store: services.cache.backend,
      auth: config.apiSecret ? 'enabled' : 'disabled',
      notifications: config.slack ? 'slack' : 'disabled',
    });
  });

  // Handle graceful shutdown
  const shutdown = (signal: string) => {
    services.logger.info('server_stopping', { signal });
    server.close(() => {
      services.logger.info('server_stopped');
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (error) {
  console.error(`Failed to start sync API: ${getErrorMessage(error)}`);
  process.exit(1);
}
