import { z } from 'zod';
import type { FetchFn, SleepFn } from '../../http/rate-limited-fetch.js';

const GongPartySchema = z.object({
  name: z.string().nullish(),
  emailAddress: z.string().nullish(),
});

const GongCallSchema = z.object({
  metaData: z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    title: z.string().nullish(),
    started: z.string().nullish(),
    duration: z.number().nullish(),
    url: z.string().nullish(),
  }),
  parties: z.array(GongPartySchema).nullish(),
  context: z.unknown().optional(),
});

export const GongSearchResponseSchema = z.object({
  calls: z.array(GongCallSchema).nullish(),
  records: z
    .object({
      cursor: z.string().nullish(),
    })
    .nullish(),
});

export const GongTranscriptResponseSchema = z.object({
  transcript: z
    .array(
      z.object({
        speakerName: z.string().nullish(),
        text: z.string().nullish(),
      }),
    )
    .nullish(),
});

export type GongCall = z.infer<typeof GongCallSchema>;
export type GongSearchResponse = z.infer<typeof GongSearchResponseSchema>;
export type TranscriptSegment = NonNullable<
  z.infer<typeof GongTranscriptResponseSchema>['transcript']
>[number];

export interface GongDateRange {
  readonly from?: string;
  readonly to?: string;
}

export interface GongSearchRequest {
  readonly filter: {
    readonly keywords: string;
    readonly dateRange?: GongDateRange;
    readonly workspaceId?: string;
  };
  readonly limit: number;
  readonly cursor?: string;
}

export type GongTranscriptResult =
  | { readonly available: true; readonly segments: readonly TranscriptSegment[] }
  | { readonly available: false; readonly status: number };

export interface GongClient {
  searchCalls(request: GongSearchRequest): Promise<GongSearchResponse>;
  getTranscript(callId: string): Promise<GongTranscriptResult>;
}

export interface GongClientDeps {
  readonly fetch?: FetchFn;
  readonly sleep?: SleepFn;
  readonly onRateLimited?: (endpoint: 'search' | 'transcript', attempt: number, delayMs: number) => void;
}
