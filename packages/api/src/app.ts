import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { ToolRegistry } from '@findr/core/src/tools/tool-registry.js';
import { createChildLogger } from '@findr/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { API_VERSION, health } from './routes/health.js';
import { createToolRoutes } from './routes/tools.js';

const log = createChildLogger('api:server');

export interface AppConfig {
  readonly registry: ToolRegistry;
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
      info: {
        title: 'findr tools API',
        version: API_VERSION,
        description: 'Web and call-transcript search tools for agent hosts',
      },
    });
    return c.json(spec);
  });

  app.route('/tools', createToolRoutes(config.registry));

  return app;
}
