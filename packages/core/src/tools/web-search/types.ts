export interface CustomSearchItem {
  readonly link?: string | null;
  readonly title?: string | null;
  readonly snippet?: string | null;
  readonly htmlSnippet?: string | null;
  readonly pagemap?: unknown;
}

export interface CustomSearchResponse {
  readonly items: readonly CustomSearchItem[];
}

export interface CustomSearchParams {
  readonly q: string;
  readonly cx: string;
}

export interface CustomSearchClient {
  list(params: CustomSearchParams): Promise<CustomSearchResponse>;
}
