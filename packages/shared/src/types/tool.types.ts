export type ToolErrorKind =
  | 'configuration'
  | 'invalid_input'
  | 'rate_limit_exhausted'
  | 'upstream_http'
  | 'unexpected';

export interface ResultRecord {
  readonly url: string;
  readonly title: string;
  readonly snippet: string;
}

export interface CallRecord {
  readonly callId: string;
  readonly title: string;
  readonly date: string;
  readonly durationSeconds: number;
  readonly parties: readonly string[];
  readonly snippet: string;
  readonly url: string;
  readonly context?: unknown;
}

export interface SourceItem {
  readonly type: 'SIMPLE_DOCUMENT';
  readonly url: string;
  readonly title: string;
  readonly htmlSnippet: string;
  readonly thumbnailImageURL?: string;
  readonly thumbnailImageW?: number;
  readonly thumbnailImageH?: number;
}

export interface SourceGroup {
  readonly toolCallDescription: string;
  readonly items: readonly SourceItem[];
}

export interface ToolSuccess<TRecord> {
  readonly output: readonly TRecord[];
  readonly sources: readonly SourceGroup[];
}

export interface ToolFailure {
  readonly output: readonly [];
  readonly error: string;
  readonly errorKind: ToolErrorKind;
}

export type ToolEnvelope<TRecord = ResultRecord | CallRecord> = ToolSuccess<TRecord> | ToolFailure;

export interface ToolRequest {
  readonly input: unknown;
}

/** Host-supplied tracing context. Tools record events on it when present. */
export interface ToolTrace {
  readonly traceId?: string;
  addEvent(name: string, attributes?: Record<string, unknown>): void;
}

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Record<string, unknown>;
}

export interface AgentTool<TRecord = ResultRecord | CallRecord> {
  readonly name: string;
  readonly descriptor: ToolDescriptor;
  invoke(request: ToolRequest, trace?: ToolTrace): Promise<ToolEnvelope<TRecord>>;
}

export function isToolFailure<TRecord>(envelope: ToolEnvelope<TRecord>): envelope is ToolFailure {
  return 'error' in envelope;
}
