/**
 * Shared types for web search providers.
 *
 * Both providers normalize to the `{ results: [...] }` shape the hosted API
 * returns natively, so `raw_content` keeps its wire name.
 */

export type SearchProviderName = "tavily" | "searxng";

export interface SearchResult {
  title: string;
  url: string;
  content: string;
  /** Full page text; null or absent when the provider cannot supply it. */
  raw_content?: string | null;
}

export interface SearchResponse {
  results: SearchResult[];
}

export interface ProviderSearchOptions {
  maxResults?: number;
  includeRawContent?: boolean;
  signal?: AbortSignal;
}

export interface SearchProvider {
  readonly name: SearchProviderName;
  search(query: string, options?: ProviderSearchOptions): Promise<SearchResponse>;
}

export const DEFAULT_MAX_RESULTS = 3;
