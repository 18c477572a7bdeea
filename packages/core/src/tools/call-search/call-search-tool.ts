import { createChildLogger } from '@findr/shared/src/logger.js';
import type {
  AgentTool,
  CallRecord,
  SourceItem,
  ToolEnvelope,
  ToolRequest,
  ToolTrace,
} from '@findr/shared/src/types/tool.types.js';
import { CallSearchInputSchema } from '@findr/schemas/src/tool-input.schema.js';
import type { CallSearchInput } from '@findr/schemas/src/tool-input.schema.js';
import type { CallSearchSettings } from '@findr/schemas/src/tool-config.schema.js';
import {
  validateCallSearchToolConfig,
  validateToolInput,
} from '@findr/schemas/src/validators.js';
import { buildToolDescriptor } from '../descriptor.js';
import { toFailureEnvelope } from '../envelope.js';
import { buildDateRange } from './date-range.js';
import { createGongClient } from './gong-client.js';
import { buildTranscriptSnippet, NO_TRANSCRIPT } from './transcript.js';
import type { GongCall, GongClient, GongClientDeps, GongSearchRequest } from './types.js';

const log = createChildLogger('call-search:tool');

export const CALL_SEARCH_TOOL_NAME = 'call-search';

const UNTITLED_CALL = 'Untitled call';

export interface CallSearchToolDeps extends GongClientDeps {
  readonly createClient?: (settings: CallSearchSettings, deps: GongClientDeps) => GongClient;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function partyNames(call: GongCall): string[] {
  return (call.parties ?? [])
    .map((party) => party.name || party.emailAddress || '')
    .filter((name) => name.length > 0);
}

function formatDuration(seconds: number): string {
  return `${String(Math.round(seconds / 60))} min`;
}

export function buildCallSourceItem(record: CallRecord): SourceItem {
  const participants = record.parties.length > 0 ? record.parties.join(', ') : 'Unknown';
  const htmlSnippet = [
    `<p><strong>Date:</strong> ${escapeHtml(record.date || 'Unknown')}</p>`,
    `<p><strong>Duration:</strong> ${formatDuration(record.durationSeconds)}</p>`,
    `<p><strong>Participants:</strong> ${escapeHtml(participants)}</p>`,
  ].join('');

  return {
    type: 'SIMPLE_DOCUMENT',
    url: record.url,
    title: record.title,
    htmlSnippet,
  };
}

/**
 * Follows `records.cursor` until `limit` calls are collected or the cursor
 * runs out. Every page shares the client's rate-limit policy.
 */
async function collectCalls(
  client: GongClient,
  input: CallSearchInput,
  trace: ToolTrace | undefined,
): Promise<GongCall[]> {
  if (input.limit === 0) {
    return [];
  }

  const dateRange = buildDateRange(input.from_date, input.to_date);
  const baseRequest: GongSearchRequest = {
    filter: {
      keywords: input.q,
      ...(dateRange ? { dateRange } : {}),
      ...(input.workspace_id ? { workspaceId: input.workspace_id } : {}),
    },
    limit: input.limit,
  };

  const calls: GongCall[] = [];
  let cursor: string | undefined;
  let page = 0;

  do {
    const response = await client.searchCalls(cursor ? { ...baseRequest, cursor } : baseRequest);
    page++;
    calls.push(...(response.calls ?? []));
    cursor = response.records?.cursor ?? undefined;

    log.debug({ page, collected: calls.length, hasCursor: Boolean(cursor) }, 'Fetched call page');
    trace?.addEvent('call_search.page', { page, collected: calls.length });
  } while (cursor && calls.length < input.limit);

  return calls.slice(0, input.limit);
}

async function buildCallRecord(client: GongClient, call: GongCall): Promise<CallRecord> {
  const { metaData } = call;
  const transcript = await client.getTranscript(metaData.id);
  const snippet = transcript.available ? buildTranscriptSnippet(transcript.segments) : NO_TRANSCRIPT;

  return {
    callId: metaData.id,
    title: metaData.title || UNTITLED_CALL,
    date: metaData.started ?? '',
    durationSeconds: metaData.duration ?? 0,
    parties: partyNames(call),
    snippet,
    url: metaData.url ?? '',
    ...(call.context !== undefined ? { context: call.context } : {}),
  };
}

export function createCallSearchTool(
  config: Record<string, unknown>,
  deps: CallSearchToolDeps = {},
): AgentTool<CallRecord> {
  const descriptor = buildToolDescriptor({
    name: CALL_SEARCH_TOOL_NAME,
    title: 'Input for the call search tool',
    description:
      'Searches recorded Gong calls by keyword, optionally within a date range or workspace. ' +
      'Returns call metadata with a transcript excerpt for each call.',
    inputSchema: CallSearchInputSchema,
  });

  const createClient = deps.createClient ?? createGongClient;

  return {
    name: CALL_SEARCH_TOOL_NAME,
    descriptor,

    async invoke(request: ToolRequest, trace?: ToolTrace): Promise<ToolEnvelope<CallRecord>> {
      try {
        // 1. Credentials and input, before any network call
        const settings = validateCallSearchToolConfig(config);
        const input = validateToolInput(CallSearchInputSchema, request.input, CALL_SEARCH_TOOL_NAME);

        log.info(
          { query: input.q, limit: input.limit, authMode: settings.credentials.mode, traceId: trace?.traceId },
          'Searching calls',
        );

        const client = createClient(settings, {
          fetch: deps.fetch,
          sleep: deps.sleep,
          onRateLimited: (endpoint, attempt, delayMs) => {
            deps.onRateLimited?.(endpoint, attempt, delayMs);
            trace?.addEvent('call_search.rate_limited', { endpoint, attempt, delayMs });
          },
        });

        // 2. Search pages
        const calls = await collectCalls(client, input, trace);

        // 3. Transcripts, one call at a time
        const output: CallRecord[] = [];
        for (const call of calls) {
          output.push(await buildCallRecord(client, call));
        }

        log.info({ query: input.q, count: output.length }, 'Call search completed');
        trace?.addEvent('call_search.completed', { count: output.length });

        return {
          output,
          sources: [
            {
              toolCallDescription: `Searched Gong calls for: ${input.q}`,
              items: output.map(buildCallSourceItem),
            },
          ],
        };
      } catch (error) {
        return toFailureEnvelope(error, log);
      }
    },
  };
}
