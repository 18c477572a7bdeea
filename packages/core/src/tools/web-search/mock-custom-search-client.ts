import { createChildLogger } from '@findr/shared/src/logger.js';
import type { CustomSearchClient, CustomSearchItem, CustomSearchResponse } from './types.js';

const log = createChildLogger('web-search:mock');

const DEFAULT_ITEMS: readonly CustomSearchItem[] = [
  {
    link: 'https://example.com/first',
    title: 'First example result',
    snippet: 'A mock result about the topic.',
    htmlSnippet: 'A mock result about the <b>topic</b>.',
    pagemap: {
      cse_thumbnail: [{ src: 'https://example.com/first.png', width: '120', height: '90' }],
    },
  },
  {
    link: 'https://example.com/second',
    title: 'Second example result',
    snippet: 'Another mock result.',
    htmlSnippet: 'Another mock result.',
  },
];

export function createMockCustomSearchClient(
  responses?: Map<string, readonly CustomSearchItem[]>,
): CustomSearchClient {
  log.info('Using mock custom search client');

  return {
    list(params): Promise<CustomSearchResponse> {
      log.debug({ q: params.q }, 'Mock custom search');
      return Promise.resolve({ items: responses?.get(params.q) ?? DEFAULT_ITEMS });
    },
  };
}
