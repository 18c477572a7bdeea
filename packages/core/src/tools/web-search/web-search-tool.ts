import { z } from 'zod';
import { createChildLogger } from '@findr/shared/src/logger.js';
import type {
  AgentTool,
  ResultRecord,
  SourceItem,
  ToolEnvelope,
  ToolRequest,
  ToolTrace,
} from '@findr/shared/src/types/tool.types.js';
import type { WebSearchSettings } from '@findr/schemas/src/tool-config.schema.js';
import { WebSearchInputSchema } from '@findr/schemas/src/tool-input.schema.js';
import {
  validateToolInput,
  validateWebSearchToolConfig,
} from '@findr/schemas/src/validators.js';
import { buildToolDescriptor } from '../descriptor.js';
import { toFailureEnvelope } from '../envelope.js';
import { createGoogleCustomSearchClient } from './google-custom-search-client.js';
import type { CustomSearchClient, CustomSearchItem } from './types.js';

const log = createChildLogger('web-search:tool');

export const WEB_SEARCH_TOOL_NAME = 'web-search';

const ThumbnailSchema = z.object({
  src: z.string(),
  width: z.union([z.string(), z.number()]).optional(),
  height: z.union([z.string(), z.number()]).optional(),
});

// Google sends cse_thumbnail as a list; a single object is accepted as well.
const PagemapSchema = z.object({
  cse_thumbnail: z.union([ThumbnailSchema, z.array(ThumbnailSchema).nonempty()]),
});

interface Thumbnail {
  readonly url: string;
  readonly width?: number;
  readonly height?: number;
}

function toDimension(value: string | number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = typeof value === 'number' ? value : Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function extractThumbnail(pagemap: unknown): Thumbnail | undefined {
  const result = PagemapSchema.safeParse(pagemap);
  if (!result.success) {
    return undefined;
  }
  const raw = result.data.cse_thumbnail;
  const thumbnail = Array.isArray(raw) ? raw[0] : raw;
  return {
    url: thumbnail.src,
    width: toDimension(thumbnail.width),
    height: toDimension(thumbnail.height),
  };
}

function toResultRecord(item: CustomSearchItem): ResultRecord {
  return {
    url: item.link ?? '',
    title: item.title ?? '',
    snippet: item.snippet ?? '',
  };
}

function toSourceItem(item: CustomSearchItem): SourceItem {
  const thumbnail = extractThumbnail(item.pagemap);
  return {
    type: 'SIMPLE_DOCUMENT',
    url: item.link ?? '',
    title: item.title ?? '',
    htmlSnippet: item.htmlSnippet ?? '',
    ...(thumbnail
      ? {
          thumbnailImageURL: thumbnail.url,
          ...(thumbnail.width !== undefined ? { thumbnailImageW: thumbnail.width } : {}),
          ...(thumbnail.height !== undefined ? { thumbnailImageH: thumbnail.height } : {}),
        }
      : {}),
  };
}

export interface WebSearchToolDeps {
  readonly createClient?: (settings: WebSearchSettings) => CustomSearchClient;
}

export function createWebSearchTool(
  config: Record<string, unknown>,
  deps: WebSearchToolDeps = {},
): AgentTool<ResultRecord> {
  const descriptor = buildToolDescriptor({
    name: WEB_SEARCH_TOOL_NAME,
    title: 'Input for the search tool',
    description:
      'Searches the web. Returns an array of results. For each result, returns url, title, and snippet',
    inputSchema: WebSearchInputSchema,
  });

  const createClient = deps.createClient ?? createGoogleCustomSearchClient;

  return {
    name: WEB_SEARCH_TOOL_NAME,
    descriptor,

    async invoke(request: ToolRequest, trace?: ToolTrace): Promise<ToolEnvelope<ResultRecord>> {
      try {
        const settings = validateWebSearchToolConfig(config);
        const { q } = validateToolInput(WebSearchInputSchema, request.input, WEB_SEARCH_TOOL_NAME);

        log.info({ query: q, traceId: trace?.traceId }, 'Searching the web');
        trace?.addEvent('web_search.request', { query: q });

        const client = createClient(settings);
        const { items } = await client.list({ q, cx: settings.engineId });

        trace?.addEvent('web_search.results', { count: items.length });

        return {
          output: items.map(toResultRecord),
          sources: [
            {
              toolCallDescription: `Performed Web Search for: ${q}`,
              items: items.map(toSourceItem),
            },
          ],
        };
      } catch (error) {
        return toFailureEnvelope(error, log);
      }
    },
  };
}
