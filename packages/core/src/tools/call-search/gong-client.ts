import type { CallSearchSettings, GongCredentials } from '@findr/schemas/src/tool-config.schema.js';
import { createChildLogger } from '@findr/shared/src/logger.js';
import { FindrError } from '@findr/shared/src/utils/errors.js';
import { fetchWithRateLimitRetry, raiseForStatus } from '../../http/rate-limited-fetch.js';
import { GongSearchResponseSchema, GongTranscriptResponseSchema } from './types.js';
import type {
  GongClient,
  GongClientDeps,
  GongSearchRequest,
  GongSearchResponse,
  GongTranscriptResult,
} from './types.js';

const log = createChildLogger('call-search:gong-client');

export function buildAuthorizationHeader(credentials: GongCredentials): string {
  if (credentials.mode === 'basic') {
    const encoded = Buffer.from(
      `${credentials.accessKey}:${credentials.accessKeySecret}`,
    ).toString('base64');
    return `Basic ${encoded}`;
  }
  return `Bearer ${credentials.token}`;
}

async function readJson(response: Response, url: string): Promise<unknown> {
  try {
    return (await response.json()) as unknown;
  } catch (error) {
    throw new FindrError(
      `Invalid JSON from ${url}: ${error instanceof Error ? error.message : String(error)}`,
      'INVALID_UPSTREAM_RESPONSE',
      error instanceof Error ? error : undefined,
    );
  }
}

export function createGongClient(
  settings: CallSearchSettings,
  deps: GongClientDeps = {},
): GongClient {
  const headers = {
    Authorization: buildAuthorizationHeader(settings.credentials),
    'Content-Type': 'application/json',
    Accept: 'application/json',
  };

  log.debug(
    { baseUrl: settings.baseUrl, authMode: settings.credentials.mode },
    'Creating Gong client',
  );

  return {
    async searchCalls(request: GongSearchRequest): Promise<GongSearchResponse> {
      const url = `${settings.baseUrl}/v2/calls/search`;
      let retries = 0;

      const response = await fetchWithRateLimitRetry(
        url,
        { method: 'POST', headers, body: JSON.stringify(request) },
        {
          maxRetries: settings.maxRateLimitRetries,
          fetch: deps.fetch,
          sleep: deps.sleep,
          onRetry: (attempt, delayMs) => {
            retries = attempt;
            deps.onRateLimited?.('search', attempt, delayMs);
          },
        },
      );
      await raiseForStatus(response, url, retries);

      const parsed = GongSearchResponseSchema.safeParse(await readJson(response, url));
      if (!parsed.success) {
        throw new FindrError(
          `Unexpected call search response from ${url}: ${parsed.error.message}`,
          'INVALID_UPSTREAM_RESPONSE',
        );
      }
      return parsed.data;
    },

    async getTranscript(callId: string): Promise<GongTranscriptResult> {
      const url = `${settings.baseUrl}/v2/calls/${encodeURIComponent(callId)}/transcript`;

      const response = await fetchWithRateLimitRetry(
        url,
        { method: 'GET', headers },
        {
          maxRetries: settings.maxRateLimitRetries,
          fetch: deps.fetch,
          sleep: deps.sleep,
          onRetry: (attempt, delayMs) => deps.onRateLimited?.('transcript', attempt, delayMs),
        },
      );

      if (!response.ok) {
        log.warn({ callId, status: response.status }, 'Transcript fetch failed');
        await response.body?.cancel();
        return { available: false, status: response.status };
      }

      let body: unknown;
      try {
        body = await readJson(response, url);
      } catch (error) {
        log.warn(
          { callId, error: error instanceof Error ? error.message : String(error) },
          'Transcript response is not JSON',
        );
        return { available: true, segments: [] };
      }

      const parsed = GongTranscriptResponseSchema.safeParse(body);
      if (!parsed.success) {
        log.warn({ callId, error: parsed.error.message }, 'Unexpected transcript response shape');
        return { available: true, segments: [] };
      }
      return { available: true, segments: parsed.data.transcript ?? [] };
    },
  };
}
