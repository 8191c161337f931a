import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_MAX_RESULTS, type SearchProviderName } from "./providers/index.js";

export const DEFAULT_MAX_TOKENS_PER_SOURCE = 1000;

export interface SearchConfig {
  readonly provider: SearchProviderName;
  readonly tavilyApiKey?: string;
  readonly searxngUrl?: string;
  readonly maxResults: number;
  readonly includeRawContent: boolean;
  readonly maxTokensPerSource: number;
}

const emptyToUndefined = (value: unknown): unknown => (value === "" ? undefined : value);

const booleanFlag = z.preprocess(
  emptyToUndefined,
  z
    .enum(["true", "false", "1", "0"])
    .default("true")
    .transform((value) => value === "true" || value === "1"),
);

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const envSchema = z.object({
  SEARCH_PROVIDER: z.preprocess(emptyToUndefined, z.enum(["tavily", "searxng"]).default("tavily")),
  TAVILY_API_KEY: z.preprocess(emptyToUndefined, z.string().optional()),
  SEARXNG_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  SEARCH_MAX_RESULTS: positiveInt(DEFAULT_MAX_RESULTS),
  SEARCH_INCLUDE_RAW_CONTENT: booleanFlag,
  SEARCH_MAX_TOKENS_PER_SOURCE: positiveInt(DEFAULT_MAX_TOKENS_PER_SOURCE),
});

/**
 * Resolve search settings from environment variables. Provider-specific
 * requirements (an API key for Tavily, a URL for SearXNG) are checked when
 * the provider is built, not here.
 */
export function loadSearchConfig(env: NodeJS.ProcessEnv = process.env): SearchConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid search configuration: ${issues.join("; ")}`);
  }

  const data = parsed.data;
  return Object.freeze({
    provider: data.SEARCH_PROVIDER,
    tavilyApiKey: data.TAVILY_API_KEY,
    searxngUrl: data.SEARXNG_URL,
    maxResults: data.SEARCH_MAX_RESULTS,
    includeRawContent: data.SEARCH_INCLUDE_RAW_CONTENT,
    maxTokensPerSource: data.SEARCH_MAX_TOKENS_PER_SOURCE,
  });
}
