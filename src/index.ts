export type { SearchConfig } from "./config.js";
export { DEFAULT_MAX_TOKENS_PER_SOURCE, loadSearchConfig } from "./config.js";
export {
  ConfigurationError,
  InputShapeError,
  SearchProviderError,
  UnsupportedProviderError,
  WebSearchError,
} from "./errors.js";
export type { FormatSourcesOptions, SourceInput } from "./format.js";
export {
  CHARS_PER_TOKEN,
  deduplicateAndFormatSources,
  formatSources,
  toSourceInput,
  TRUNCATION_MARKER,
} from "./format.js";
export type { LogLevel } from "./logger.js";
export { createChildLogger, logger } from "./logger.js";
export {
  DEFAULT_MAX_RESULTS,
  DEFAULT_SEARXNG_ENGINES,
  SearxngSearchProvider,
  TavilySearchProvider,
} from "./providers/index.js";
export type {
  ProviderSearchOptions,
  SearchProvider,
  SearchProviderName,
  SearchResponse,
  SearchResult,
  SearxngProviderConfig,
  TavilyProviderConfig,
  TavilySearchDepth,
  TavilySearchResponse,
  TavilySearchResult,
} from "./providers/index.js";
export type { WebSearchOptions } from "./web-search.js";
export { buildProvider, webSearch } from "./web-search.js";
