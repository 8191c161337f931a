/**
 * SearXNG provider.
 *
 * Queries a self-hosted SearXNG instance through its JSON search endpoint.
 * SearXNG returns snippets only, so `raw_content` is always null.
 *
 * Docs: https://docs.searxng.org/dev/search_api.html
 */

import { SearchProviderError, toError } from "../errors.js";
import {
  DEFAULT_MAX_RESULTS,
  type ProviderSearchOptions,
  type SearchProvider,
  type SearchResponse,
  type SearchResult,
} from "./types.js";

export const DEFAULT_SEARXNG_ENGINES: readonly string[] = ["google", "bing", "duckduckgo"];

export interface SearxngProviderConfig {
  baseUrl: string;
  /** Engines to query; an empty list lets the instance use its defaults. */
  engines?: readonly string[];
}

interface SearxngApiResponse {
  results?: Array<{ title?: string; url?: string; content?: string }>;
}

export class SearxngSearchProvider implements SearchProvider {
  readonly name = "searxng";
  readonly baseUrl: string;
  private readonly engines: readonly string[];

  constructor(cfg: SearxngProviderConfig) {
    this.baseUrl = cfg.baseUrl.replace(/\/+$/, "");
    this.engines = cfg.engines ?? DEFAULT_SEARXNG_ENGINES;
  }

  async search(query: string, options: ProviderSearchOptions = {}): Promise<SearchResponse> {
    // includeRawContent is accepted for parity with the hosted provider only.
    const maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;

    try {
      const url = new URL(`${this.baseUrl}/search`);
      url.searchParams.set("q", query);
      url.searchParams.set("format", "json");
      if (this.engines.length > 0) {
        url.searchParams.set("engines", this.engines.join(","));
      }
      url.searchParams.set("max_results", String(maxResults));

      const response = await fetch(url.toString(), {
        headers: { Accept: "application/json" },
        signal: options.signal,
      });

      if (!response.ok) {
        const text = await response.text().catch(() => "");
        throw new Error(`SearXNG returned ${response.status}: ${text.slice(0, 200)}`);
      }

      const data = (await response.json()) as SearxngApiResponse;

      // max_results is only a hint to the instance
      const results: SearchResult[] = (data.results ?? []).slice(0, maxResults).map((item) => ({
        title: item.title ?? "",
        url: item.url ?? "",
        content: item.content ?? "",
        raw_content: null,
      }));

      return { results };
    } catch (err: unknown) {
      const cause = toError(err);
      throw new SearchProviderError(`SearXNG search failed: ${cause.message}`, cause);
    }
  }
}
