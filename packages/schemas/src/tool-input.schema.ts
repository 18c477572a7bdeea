import { z } from 'zod';

export const DEFAULT_CALL_SEARCH_LIMIT = 10;

export const WebSearchInputSchema = z.object({
  q: z.string().trim().min(1).describe('The query string'),
});

export const CallSearchInputSchema = z.object({
  q: z.string().trim().min(1).describe('Keywords to search for in call titles and transcripts'),
  from_date: z
    .string()
    .optional()
    .describe('Only calls started on or after this date (YYYY-MM-DD or ISO-8601 timestamp)'),
  to_date: z
    .string()
    .optional()
    .describe('Only calls started before this date (YYYY-MM-DD or ISO-8601 timestamp)'),
  limit: z
    .number()
    .int()
    .min(0)
    .default(DEFAULT_CALL_SEARCH_LIMIT)
    .describe('Maximum number of calls to return'),
  workspace_id: z.string().min(1).optional().describe('Restrict the search to one Gong workspace'),
});

export type WebSearchInput = z.infer<typeof WebSearchInputSchema>;
export type CallSearchInput = z.infer<typeof CallSearchInputSchema>;
