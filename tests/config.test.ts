import { describe, expect, it } from "vitest";
import { DEFAULT_MAX_TOKENS_PER_SOURCE, loadSearchConfig } from "../src/config.js";
import { ConfigurationError } from "../src/errors.js";

describe("loadSearchConfig", () => {
  it("should apply defaults to an empty environment", () => {
    expect(loadSearchConfig({})).toEqual({
      provider: "tavily",
      tavilyApiKey: undefined,
      searxngUrl: undefined,
      maxResults: 3,
      includeRawContent: true,
      maxTokensPerSource: DEFAULT_MAX_TOKENS_PER_SOURCE,
    });
  });

  it("should read every variable", () => {
    const config = loadSearchConfig({
      SEARCH_PROVIDER: "searxng",
      TAVILY_API_KEY: "test-key",
      SEARXNG_URL: "http://localhost:8888",
      SEARCH_MAX_RESULTS: "7",
      SEARCH_INCLUDE_RAW_CONTENT: "0",
      SEARCH_MAX_TOKENS_PER_SOURCE: "250",
    });

    expect(config).toEqual({
      provider: "searxng",
      tavilyApiKey: "test-key",
      searxngUrl: "http://localhost:8888",
      maxResults: 7,
      includeRawContent: false,
      maxTokensPerSource: 250,
    });
  });

  it("should treat empty strings as unset", () => {
    const config = loadSearchConfig({ SEARCH_PROVIDER: "", SEARXNG_URL: "", SEARCH_MAX_RESULTS: "" });
    expect(config.provider).toBe("tavily");
    expect(config.searxngUrl).toBeUndefined();
    expect(config.maxResults).toBe(3);
  });

  it("should return a frozen config", () => {
    expect(Object.isFrozen(loadSearchConfig({}))).toBe(true);
  });

  it("should reject an unknown provider", () => {
    expect(() => loadSearchConfig({ SEARCH_PROVIDER: "bing" })).toThrow(ConfigurationError);
  });

  it("should reject a non-positive result cap", () => {
    expect(() => loadSearchConfig({ SEARCH_MAX_RESULTS: "0" })).toThrow("SEARCH_MAX_RESULTS");
  });

  it("should reject an invalid SearXNG url", () => {
    expect(() => loadSearchConfig({ SEARXNG_URL: "not a url" })).toThrow("SEARXNG_URL");
  });

  it("should reject an unrecognized boolean flag", () => {
    expect(() => loadSearchConfig({ SEARCH_INCLUDE_RAW_CONTENT: "yes" })).toThrow("SEARCH_INCLUDE_RAW_CONTENT");
  });
});
