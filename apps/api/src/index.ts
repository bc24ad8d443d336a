import 'dotenv/config';
import { serve } from '@hono/node-server';
import { logger } from '@gatehouse/observability';
import { createApp } from './app.js';
import { ConfigError, loadConfig, type AppConfig } from './config.js';
import { initializeAuditLogging } from './lib/audit-logger.js';
import { createServices } from './services/index.js';

function readConfig(): AppConfig | null {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, error.message);
      process.exitCode = 1;
      return null;
    }
    throw error;
  }
}

function start() {
  const config = readConfig();
  if (!config) {
    return;
  }

  // Initialize audit logging for authentication events
  initializeAuditLogging();

  const { pool, authFlowService } = createServices(config);
  const app = createApp({ flows: authFlowService, config });

  logger.info({ port: config.port, scheme: config.scheme, domain: config.domain }, 'Starting server');

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info({ port: info.port }, 'Server running');
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      pool.end().catch((error: unknown) => {
        logger.error({ err: error }, 'Failed to close database pool');
      });
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

start();
