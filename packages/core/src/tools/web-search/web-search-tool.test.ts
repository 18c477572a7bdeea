import { describe, it, expect, vi } from 'vitest';
import { createWebSearchTool, extractThumbnail } from './web-search-tool.js';
import { createMockCustomSearchClient } from './mock-custom-search-client.js';
import type { CustomSearchClient, CustomSearchItem } from './types.js';
import { isToolFailure } from '@findr/shared/src/types/tool.types.js';
import { UpstreamHttpError } from '@findr/shared/src/utils/errors.js';

const config = {
  google_search_api_connection: { apiKey: 'test-key' },
  cx: 'engine-1',
};

const items: CustomSearchItem[] = [
  {
    link: 'https://example.com/a',
    title: 'Result A',
    snippet: 'Snippet A',
    htmlSnippet: '<b>Snippet</b> A',
    pagemap: { cse_thumbnail: [{ src: 'https://example.com/a.png', width: '225', height: '225' }] },
  },
  {
    link: 'https://example.com/b',
    title: 'Result B',
    snippet: 'Snippet B',
    htmlSnippet: 'Snippet B',
    pagemap: { metatags: [{ 'og:title': 'B' }] },
  },
];

function withItems(responseItems: readonly CustomSearchItem[]): () => CustomSearchClient {
  return () => createMockCustomSearchClient(new Map([['solar panels', responseItems]]));
}

describe('WebSearchTool', () => {
  it('should publish the search descriptor', () => {
    const tool = createWebSearchTool(config);

    expect(tool.name).toBe('web-search');
    expect(tool.descriptor.description).toBe(
      'Searches the web. Returns an array of results. For each result, returns url, title, and snippet',
    );
    expect(tool.descriptor.inputSchema).toMatchObject({
      $id: 'urn:findr:tools:web-search:input',
      title: 'Input for the search tool',
      type: 'object',
      properties: { q: { type: 'string', description: 'The query string' } },
      required: ['q'],
    });
  });

  it('should map each hit to a result and a source item in upstream order', async () => {
    const tool = createWebSearchTool(config, { createClient: withItems(items) });

    const envelope = await tool.invoke({ input: { q: 'solar panels' } });

    expect(envelope).toEqual({
      output: [
        { url: 'https://example.com/a', title: 'Result A', snippet: 'Snippet A' },
        { url: 'https://example.com/b', title: 'Result B', snippet: 'Snippet B' },
      ],
      sources: [
        {
          toolCallDescription: 'Performed Web Search for: solar panels',
          items: [
            {
              type: 'SIMPLE_DOCUMENT',
              url: 'https://example.com/a',
              title: 'Result A',
              htmlSnippet: '<b>Snippet</b> A',
              thumbnailImageURL: 'https://example.com/a.png',
              thumbnailImageW: 225,
              thumbnailImageH: 225,
            },
            {
              type: 'SIMPLE_DOCUMENT',
              url: 'https://example.com/b',
              title: 'Result B',
              htmlSnippet: 'Snippet B',
            },
          ],
        },
      ],
    });
  });

  it('should leave thumbnail fields out when upstream has none', async () => {
    const tool = createWebSearchTool(config, { createClient: withItems([items[1] ?? {}]) });

    const envelope = await tool.invoke({ input: { q: 'solar panels' } });

    if (isToolFailure(envelope)) {
      throw new Error(envelope.error);
    }
    expect(envelope.sources[0]?.items[0]).not.toHaveProperty('thumbnailImageURL');
  });

  it('should return an empty result list when upstream has no items', async () => {
    const tool = createWebSearchTool(config, { createClient: withItems([]) });

    const envelope = await tool.invoke({ input: { q: 'solar panels' } });

    expect(envelope).toEqual({
      output: [],
      sources: [{ toolCallDescription: 'Performed Web Search for: solar panels', items: [] }],
    });
  });

  it('should pass the query and engine id to the client', async () => {
    const list = vi.fn().mockResolvedValue({ items: [] });
    const createClient = vi.fn().mockReturnValue({ list });
    const tool = createWebSearchTool(config, { createClient });

    await tool.invoke({ input: { q: 'solar panels' } });

    expect(createClient).toHaveBeenCalledWith({ apiKey: 'test-key', engineId: 'engine-1' });
    expect(list).toHaveBeenCalledWith({ q: 'solar panels', cx: 'engine-1' });
  });

  it('should return a configuration error without calling the client', async () => {
    const createClient = vi.fn();
    const tool = createWebSearchTool({ cx: 'engine-1' }, { createClient });

    const envelope = await tool.invoke({ input: { q: 'solar panels' } });

    expect(isToolFailure(envelope) && envelope.errorKind).toBe('configuration');
    expect(createClient).not.toHaveBeenCalled();
  });

  it('should return an upstream error envelope when the API fails', async () => {
    const tool = createWebSearchTool(config, {
      createClient: () => ({
        list: () =>
          Promise.reject(new UpstreamHttpError('Custom search failed with 403: forbidden', 403)),
      }),
    });

    const envelope = await tool.invoke({ input: { q: 'solar panels' } });

    expect(envelope).toEqual({
      output: [],
      error: 'HTTP error occurred: Custom search failed with 403: forbidden',
      errorKind: 'upstream_http',
    });
  });

  it('should report other client failures as unexpected', async () => {
    const tool = createWebSearchTool(config, {
      createClient: () => ({ list: () => Promise.reject(new Error('socket hang up')) }),
    });

    const envelope = await tool.invoke({ input: { q: 'solar panels' } });

    expect(envelope).toEqual({
      output: [],
      error: 'An error occurred: socket hang up',
      errorKind: 'unexpected',
    });
  });
});

describe('extractThumbnail', () => {
  it('should read the first entry of a thumbnail list', () => {
    expect(
      extractThumbnail({
        cse_thumbnail: [
          { src: 'https://example.com/1.png', width: '100', height: '80' },
          { src: 'https://example.com/2.png' },
        ],
      }),
    ).toEqual({ url: 'https://example.com/1.png', width: 100, height: 80 });
  });

  it('should accept a single thumbnail object', () => {
    expect(extractThumbnail({ cse_thumbnail: { src: 'https://example.com/1.png' } })).toEqual({
      url: 'https://example.com/1.png',
      width: undefined,
      height: undefined,
    });
  });

  it('should return undefined without a src', () => {
    expect(extractThumbnail({ cse_thumbnail: [{ width: '100' }] })).toBeUndefined();
    expect(extractThumbnail({ cse_image: [{ src: 'https://example.com/1.png' }] })).toBeUndefined();
    expect(extractThumbnail(undefined)).toBeUndefined();
  });
});
