import { Hono } from 'hono';
import type { AuthFlowService } from '@gatehouse/core';
import { logger as defaultLogger, type Logger } from '@gatehouse/observability';
import type { AppConfig } from './config.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createAuthRoutes } from './routes/auth.js';
import { healthRoute } from './routes/health.js';
import type { AppBindings } from './types/context.js';

export interface AppDependencies {
  flows: AuthFlowService;
  config: AppConfig;
  logger?: Logger;
}

export function createApp({ flows, config, logger = defaultLogger }: AppDependencies) {
  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);

  app.route('/health', healthRoute);

  app.route(
    '/',
    createAuthRoutes(flows, {
      cookieSecret: config.cookieSecret,
      urls: {
        authServiceUrl: config.authServiceUrl,
        accountServiceUrl: config.accountServiceUrl,
        chatServiceUrl: config.chatServiceUrl,
        cdnUrl: config.cdnUrl,
      },
    })
  );

  app.notFound((c) => c.text('Not Found', 404));

  app.onError((error, c) => {
    logger.error({ err: error, requestId: c.get('requestId'), path: c.req.path }, 'Unhandled error');
    return c.text('Internal server error.', 500);
  });

  return app;
}
