import { z } from '@hono/zod-openapi';

export const ToolNameParamSchema = z.object({
  name: z
    .string()
    .min(1)
    .openapi({ param: { name: 'name', in: 'path' }, example: 'web-search' }),
});

export const InvokeToolRequestSchema = z
  .object({
    input: z.unknown().openapi({ example: { q: 'quarterly pricing review' } }),
    traceId: z.string().min(1).optional(),
  })
  .openapi('InvokeToolRequest');

export type InvokeToolRequest = z.infer<typeof InvokeToolRequestSchema>;
