import { z } from '@hono/zod-openapi';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

// Tools
export const ToolDescriptorSchema = z
  .object({
    name: z.string(),
    description: z.string(),
    inputSchema: z.record(z.unknown()),
  })
  .openapi('ToolDescriptor');

export const ToolListResponseSchema = z
  .object({
    tools: z.array(ToolDescriptorSchema),
  })
  .openapi('ToolListResponse');

const SourceItemSchema = z
  .object({
    type: z.literal('SIMPLE_DOCUMENT'),
    url: z.string(),
    title: z.string(),
    htmlSnippet: z.string(),
    thumbnailImageURL: z.string().optional(),
    thumbnailImageW: z.number().optional(),
    thumbnailImageH: z.number().optional(),
  })
  .openapi('SourceItem');

export const ToolEnvelopeResponseSchema = z
  .object({
    output: z.array(z.unknown()),
    sources: z
      .array(
        z.object({
          toolCallDescription: z.string(),
          items: z.array(SourceItemSchema),
        }),
      )
      .optional(),
    error: z.string().optional(),
    errorKind: z
      .enum(['configuration', 'invalid_input', 'rate_limit_exhausted', 'upstream_http', 'unexpected'])
      .optional(),
  })
  .openapi('ToolEnvelope');

export type ToolEnvelopeResponse = z.infer<typeof ToolEnvelopeResponseSchema>;
