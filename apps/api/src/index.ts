import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { secureHeaders } from 'hono/secure-headers';
import { getConfig } from './services/config';
import { createAppServices, type AppServices } from './services/container';
import { SessionNotFoundError } from './services/errors';
import { log } from './services/logging';

// Route imports
import { createIntentRoutes } from './routes/intent';
import { createSearchRoutes } from './routes/search';
import { createAnalysisRoutes } from './routes/analysis';

const VERSION = '0.1.0';

export function createApp(services: AppServices = createAppServices()) {
  const app = new Hono();

  // Middleware
  app.use('*', logger());
  app.use('*', secureHeaders());
  app.use(
    '*',
    cors({
      origin: process.env.ALLOWED_ORIGINS?.split(',') || getConfig().server.allowedOrigins,
      credentials: true,
    })
  );

  app.get('/', (c) => {
    return c.json({
      name: 'Research Radar API',
      version: VERSION,
      docs: '/api/health',
    });
  });

  // Health check
  app.get('/api/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: VERSION,
      model: services.llm.getModel(),
    });
  });

  // API Routes
  app.route('/api/intent', createIntentRoutes(services));
  app.route('/api/search', createSearchRoutes(services));
  app.route('/api/analysis', createAnalysisRoutes(services));

  app.notFound((c) => {
    return c.json({ error: { code: 'NOT_FOUND', message: 'Route not found' } }, 404);
  });

  app.onError((err, c) => {
    if (err instanceof SessionNotFoundError) {
      return c.json({ error: { code: 'SESSION_NOT_FOUND', message: err.message } }, 404);
    }

    log({ level: 'error', component: 'Api', message: `Unhandled error: ${err.stack ?? err.message}` });
    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
        },
      },
      500
    );
  });

  return app;
}
