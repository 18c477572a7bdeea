import type { WebSearchSettings } from '@findr/schemas/src/tool-config.schema.js';
import { createChildLogger } from '@findr/shared/src/logger.js';
import { ConfigurationError, UpstreamHttpError } from '@findr/shared/src/utils/errors.js';
import type { CustomSearchClient, CustomSearchParams, CustomSearchResponse } from './types.js';

const log = createChildLogger('web-search:google');

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('response' in error)) {
    return undefined;
  }
  const { response } = error;
  if (typeof response === 'object' && response !== null && 'status' in response) {
    return typeof response.status === 'number' ? response.status : undefined;
  }
  return undefined;
}

export function createGoogleCustomSearchClient(settings: WebSearchSettings): CustomSearchClient {
  if (!settings.apiKey) {
    throw new ConfigurationError('API key is required for the Google custom search client');
  }

  return {
    async list(params: CustomSearchParams): Promise<CustomSearchResponse> {
      log.debug({ q: params.q, cx: params.cx }, 'Issuing cse.list');

      const { google } = await import('googleapis');
      const customsearch = google.customsearch({ version: 'v1', auth: settings.apiKey });

      try {
        const res = await customsearch.cse.list({ q: params.q, cx: params.cx });
        const items = res.data.items ?? [];
        log.debug({ q: params.q, count: items.length }, 'Custom search completed');
        return { items };
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        const status = httpStatusOf(error);
        if (status !== undefined) {
          throw new UpstreamHttpError(`Custom search failed with ${String(status)}: ${cause.message}`, status, cause);
        }
        throw cause;
      }
    },
  };
}
