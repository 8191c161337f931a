/**
 * Web search providers barrel export.
 */

export { DEFAULT_SEARXNG_ENGINES, SearxngSearchProvider } from "./searxng.js";
export type { SearxngProviderConfig } from "./searxng.js";
export { TavilySearchProvider } from "./tavily.js";
export type {
  TavilyProviderConfig,
  TavilySearchDepth,
  TavilySearchResponse,
  TavilySearchResult,
} from "./tavily.js";
export { DEFAULT_MAX_RESULTS } from "./types.js";
export type {
  ProviderSearchOptions,
  SearchProvider,
  SearchProviderName,
  SearchResponse,
  SearchResult,
} from "./types.js";
