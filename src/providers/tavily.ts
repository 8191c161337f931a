/**
 * Tavily search provider.
 *
 * Requires:
 *   - API key (TAVILY_API_KEY, resolved by the caller)
 *
 * The native response already has the normalized `{ results }` shape and is
 * returned as-is.
 *
 * Docs: https://docs.tavily.com/documentation/api-reference/endpoint/search
 */

import { ConfigurationError, SearchProviderError, toError } from "../errors.js";
import {
  DEFAULT_MAX_RESULTS,
  type ProviderSearchOptions,
  type SearchProvider,
  type SearchResponse,
  type SearchResult,
} from "./types.js";

const TAVILY_SEARCH_URL = "https://api.tavily.com/search";

export type TavilySearchDepth = "basic" | "advanced";

export interface TavilyProviderConfig {
  apiKey: string;
  searchDepth?: TavilySearchDepth;
}

export interface TavilySearchResult extends SearchResult {
  score?: number;
}

export interface TavilySearchResponse extends SearchResponse {
  query?: string;
  answer?: string | null;
  response_time?: number;
  results: TavilySearchResult[];
}

export class TavilySearchProvider implements SearchProvider {
  readonly name = "tavily";
  private readonly apiKey: string;
  private readonly searchDepth: TavilySearchDepth;

  constructor(cfg: TavilyProviderConfig) {
    if (!cfg.apiKey) {
      throw new ConfigurationError("Tavily provider requires an API key");
    }
    this.apiKey = cfg.apiKey;
    this.searchDepth = cfg.searchDepth ?? "basic";
  }

  async search(query: string, options: ProviderSearchOptions = {}): Promise<TavilySearchResponse> {
    let response: Response;
    try {
      response = await fetch(TAVILY_SEARCH_URL, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          query,
          max_results: options.maxResults ?? DEFAULT_MAX_RESULTS,
          include_raw_content: options.includeRawContent ?? true,
          search_depth: this.searchDepth,
        }),
        signal: options.signal,
      });
    } catch (err: unknown) {
      const cause = toError(err);
      throw new SearchProviderError(`Tavily search failed: ${cause.message}`, cause);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw new SearchProviderError(`Tavily search failed: API returned ${response.status}: ${text.slice(0, 200)}`);
    }

    let data: Partial<TavilySearchResponse> | null;
    try {
      data = (await response.json()) as Partial<TavilySearchResponse> | null;
    } catch (err: unknown) {
      const cause = toError(err);
      throw new SearchProviderError(`Tavily search failed: ${cause.message}`, cause);
    }

    if (typeof data !== "object" || data === null || Array.isArray(data)) {
      throw new SearchProviderError("Tavily search failed: response body is not a JSON object");
    }

    return { ...data, results: data.results ?? [] };
  }
}
