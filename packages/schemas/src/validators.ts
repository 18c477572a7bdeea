import type { output, ZodError, ZodTypeAny } from 'zod';
import { ConfigurationError, SchemaValidationError } from '@findr/shared/src/utils/errors.js';
import {
  CallSearchToolConfigSchema,
  WebSearchToolConfigSchema,
} from './tool-config.schema.js';
import type {
  CallSearchSettings,
  GongCredentials,
  WebSearchSettings,
} from './tool-config.schema.js';

function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateToolInput<S extends ZodTypeAny>(
  schema: S,
  data: unknown,
  toolName: string,
): output<S> {
  const result = schema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError(
      `Invalid input for tool ${toolName}`,
      formatZodErrors(result.error),
    );
  }

  return result.data;
}

export function validateWebSearchToolConfig(data: unknown): WebSearchSettings {
  const result = WebSearchToolConfigSchema.safeParse(data);

  if (!result.success) {
    throw new ConfigurationError(
      `Invalid web search configuration: ${formatZodErrors(result.error).join('; ')}`,
    );
  }

  return {
    apiKey: result.data.google_search_api_connection.apiKey,
    engineId: result.data.cx,
  };
}

export function validateCallSearchToolConfig(data: unknown): CallSearchSettings {
  const result = CallSearchToolConfigSchema.safeParse(data);

  if (!result.success) {
    throw new ConfigurationError(
      `Invalid call search configuration: ${formatZodErrors(result.error).join('; ')}`,
    );
  }

  const config = result.data;
  let credentials: GongCredentials;

  if (config.gong_access_key && config.gong_access_key_secret) {
    credentials = {
      mode: 'basic',
      accessKey: config.gong_access_key,
      accessKeySecret: config.gong_access_key_secret,
    };
  } else if (config.gong_bearer_token) {
    credentials = { mode: 'bearer', token: config.gong_bearer_token };
  } else {
    throw new ConfigurationError(
      'Gong credentials are missing: configure gong_access_key and gong_access_key_secret, or gong_bearer_token',
    );
  }

  return {
    credentials,
    baseUrl: config.gong_base_url.replace(/\/+$/, ''),
    maxRateLimitRetries: config.max_rate_limit_retries,
  };
}
