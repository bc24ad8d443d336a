import { Hono } from 'hono';

export const SERVICE_VERSION = '1.0.0';

const healthRoute = new Hono();

healthRoute.get('/', (c) => {
  const response = {
    status: 'ok' as const,
    timestamp: new Date().toISOString(),
    version: SERVICE_VERSION,
  };

  return c.json(response);
});

export { healthRoute };
