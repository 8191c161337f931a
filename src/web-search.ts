/**
 * Unified web search entry point.
 *
 * Dispatches to the hosted Tavily API or a self-hosted SearXNG instance and
 * returns the provider's response in the shared `{ results }` shape.
 */

import { ConfigurationError, UnsupportedProviderError } from "./errors.js";
import { createChildLogger } from "./logger.js";
import {
  DEFAULT_MAX_RESULTS,
  type SearchProvider,
  type SearchProviderName,
  type SearchResponse,
  SearxngSearchProvider,
  TavilySearchProvider,
} from "./providers/index.js";

const log = createChildLogger("web-search");

export interface WebSearchOptions {
  provider?: SearchProviderName;
  /** Base URL of the SearXNG instance; required when provider is "searxng". */
  searxngUrl?: string | null;
  /** Tavily credentials; required when provider is "tavily". */
  tavilyApiKey?: string | null;
  /** Only the hosted provider can return full page content. */
  includeRawContent?: boolean;
  maxResults?: number;
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Provider factory
// ---------------------------------------------------------------------------

export function buildProvider(name: string, options: WebSearchOptions = {}): SearchProvider {
  switch (name) {
    case "tavily": {
      if (!options.tavilyApiKey) {
        throw new ConfigurationError("tavilyApiKey must be provided when using Tavily");
      }
      return new TavilySearchProvider({ apiKey: options.tavilyApiKey });
    }
    case "searxng": {
      if (!options.searxngUrl) {
        throw new ConfigurationError("searxngUrl must be provided when using SearXNG");
      }
      return new SearxngSearchProvider({ baseUrl: options.searxngUrl });
    }
    default:
      throw new UnsupportedProviderError(name);
  }
}

// ---------------------------------------------------------------------------
// Search
// ---------------------------------------------------------------------------

export async function webSearch(query: string, options: WebSearchOptions = {}): Promise<SearchResponse> {
  const providerName = options.provider ?? "tavily";
  const maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
  const includeRawContent = options.includeRawContent ?? true;
  const startedAt = Date.now();

  try {
    const provider = buildProvider(providerName, options);
    log.debug({ provider: providerName, query, maxResults, includeRawContent }, "web search started");
    const response = await provider.search(query, { maxResults, includeRawContent, signal: options.signal });
    log.debug(
      { provider: providerName, resultCount: response.results.length, durationMs: Date.now() - startedAt },
      "web search completed",
    );
    return response;
  } catch (err: unknown) {
    log.error({ provider: providerName, err, durationMs: Date.now() - startedAt }, "web search failed");
    throw err;
  }
}
