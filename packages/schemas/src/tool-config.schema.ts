import { z } from 'zod';

export const DEFAULT_GONG_BASE_URL = 'https://us-13359.api.gong.io';
export const DEFAULT_MAX_RATE_LIMIT_RETRIES = 3;

export const WebSearchToolConfigSchema = z.object({
  google_search_api_connection: z.object({
    apiKey: z.string().min(1),
  }),
  cx: z.string().min(1),
});

export const CallSearchToolConfigSchema = z.object({
  gong_access_key: z.string().min(1).optional(),
  gong_access_key_secret: z.string().min(1).optional(),
  gong_bearer_token: z.string().min(1).optional(),
  gong_base_url: z.string().url().default(DEFAULT_GONG_BASE_URL),
  max_rate_limit_retries: z.number().int().min(0).max(10).default(DEFAULT_MAX_RATE_LIMIT_RETRIES),
});

export const ToolsFileSchema = z.object({
  webSearch: z.record(z.unknown()).optional(),
  callSearch: z.record(z.unknown()).optional(),
});

export type WebSearchToolConfig = z.infer<typeof WebSearchToolConfigSchema>;
export type CallSearchToolConfig = z.infer<typeof CallSearchToolConfigSchema>;
export type ToolsFile = z.infer<typeof ToolsFileSchema>;

export type GongCredentials =
  | { readonly mode: 'basic'; readonly accessKey: string; readonly accessKeySecret: string }
  | { readonly mode: 'bearer'; readonly token: string };

export interface WebSearchSettings {
  readonly apiKey: string;
  readonly engineId: string;
}

export interface CallSearchSettings {
  readonly credentials: GongCredentials;
  readonly baseUrl: string;
  readonly maxRateLimitRetries: number;
}
