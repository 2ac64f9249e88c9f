import { Hono } from 'hono';
import logger from './lib/logger.js';
import type { ProviderName } from './lib/config.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createMatchingRoutes, type MatchingRouteDeps } from './routes/matching.js';

export interface AppDeps extends MatchingRouteDeps {
  providerName: ProviderName;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({ status: 'ok', provider: deps.providerName });
  });

  app.route('/api', createMatchingRoutes(deps));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}
