import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { Pipeline } from '@scholar/core/src/orchestration/pipeline.js';
import { createChildLogger } from '@scholar/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { health } from './routes/health.js';
import { createResearchRoutes } from './routes/research.js';

const log = createChildLogger('api:server');

export const OPENAPI_INFO = {
  title: 'Scholar API',
  version: '1.0.0',
  description: 'Web research assistant that searches, condenses and writes answers',
};

export interface AppConfig {
  readonly pipeline: Pipeline;
}

export function createApp(config: AppConfig): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route('/health', health);

  app.get('/openapi.json', (c) => {
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: OPENAPI_INFO,
    });
    return c.json(spec);
  });

  app.route('/research', createResearchRoutes(config.pipeline));

  return app;
}
