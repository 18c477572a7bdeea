import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { ToolRegistry } from '@findr/core/src/tools/tool-registry.js';
import type { ToolEnvelope } from '@findr/shared/src/types/tool.types.js';
import { createRouter, type AppEnv } from '../types.js';
import { createLogTrace } from '../trace.js';
import { InvokeToolRequestSchema, ToolNameParamSchema } from '../schemas/requests.js';
import {
  ErrorResponseSchema,
  ToolEnvelopeResponseSchema,
  ToolListResponseSchema,
} from '../schemas/responses.js';
import type { ToolEnvelopeResponse } from '../schemas/responses.js';

const listToolsRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Tools'],
  summary: 'List tool descriptors',
  responses: {
    200: {
      description: 'Descriptors of all registered tools',
      content: {
        'application/json': {
          schema: ToolListResponseSchema,
        },
      },
    },
  },
});

const invokeToolRoute = createRoute({
  method: 'post',
  path: '/{name}/invoke',
  tags: ['Tools'],
  summary: 'Invoke a tool',
  description:
    'Runs the tool once. Tool failures come back as an envelope with an empty output and an error.',
  request: {
    params: ToolNameParamSchema,
    body: {
      content: {
        'application/json': {
          schema: InvokeToolRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Result envelope',
      content: {
        'application/json': {
          schema: ToolEnvelopeResponseSchema,
        },
      },
    },
    400: {
      description: 'Malformed request',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
    404: {
      description: 'Unknown tool',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

function toResponseBody(envelope: ToolEnvelope): ToolEnvelopeResponse {
  if ('error' in envelope) {
    return { output: [], error: envelope.error, errorKind: envelope.errorKind };
  }
  return {
    output: [...envelope.output],
    sources: envelope.sources.map((group) => ({
      toolCallDescription: group.toolCallDescription,
      items: group.items.map((item) => ({ ...item })),
    })),
  };
}

export function createToolRoutes(registry: ToolRegistry): OpenAPIHono<AppEnv> {
  const router = createRouter();

  router.openapi(listToolsRoute, (c) => {
    const tools = registry.list().map((descriptor) => ({ ...descriptor }));
    return c.json({ tools }, 200);
  });

  router.openapi(invokeToolRoute, async (c) => {
    const { name } = c.req.valid('param');
    const body = c.req.valid('json');
    const trace = body.traceId ? createLogTrace(body.traceId, c.get('requestId')) : undefined;

    const envelope = await registry.invoke(name, { input: body.input }, trace);
    return c.json(toResponseBody(envelope), 200);
  });

  return router;
}
