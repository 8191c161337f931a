/**
 * Turns normalized search responses into text: deduplicated source blocks for
 * an LLM prompt, or a bullet list for citations.
 */

import { z } from "zod";
import { InputShapeError } from "./errors.js";
import { createChildLogger } from "./logger.js";
import type { SearchResponse, SearchResult } from "./providers/index.js";

const log = createChildLogger("format");

/** Rough characters-per-token ratio used to size raw content. */
export const CHARS_PER_TOKEN = 4;
export const TRUNCATION_MARKER = "... [truncated]";

export type SourceInput =
  | { kind: "response"; response: SearchResponse }
  | { kind: "responses"; responses: SearchResponse[] }
  | { kind: "results"; results: SearchResult[] };

export interface FormatSourcesOptions {
  maxTokensPerSource: number;
  includeRawContent?: boolean;
}

// ---------------------------------------------------------------------------
// Input classification
// ---------------------------------------------------------------------------

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

const searchResultSchema = z.object({
  title: optionalText,
  url: optionalText,
  content: optionalText,
  raw_content: z.string().nullish(),
});

const searchResponseSchema = z.object({
  results: z.array(searchResultSchema).default([]),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, shape: string): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InputShapeError(`Invalid ${shape}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Classify an untyped value (e.g. parsed JSON) as one of the accepted input
 * shapes. Missing title/url/content fields default to "".
 */
export function toSourceInput(value: unknown): SourceInput {
  if (Array.isArray(value)) {
    const responseCount = value.filter((item) => isRecord(item) && "results" in item).length;
    if (responseCount > 0 && responseCount < value.length) {
      throw new InputShapeError("List mixes search responses with search results");
    }
    if (responseCount > 0) {
      return { kind: "responses", responses: parseOrThrow(z.array(searchResponseSchema), value, "search responses") };
    }
    return { kind: "results", results: parseOrThrow(z.array(searchResultSchema), value, "search results") };
  }
  if (isRecord(value)) {
    return { kind: "response", response: parseOrThrow(searchResponseSchema, value, "search response") };
  }
  throw new InputShapeError(
    "Input must be a search response, a list of search responses, or a list of search results",
  );
}

function flatten(input: SourceInput): SearchResult[] {
  switch (input.kind) {
    case "response":
      return input.response.results;
    case "responses":
      return input.responses.flatMap((response) => response.results);
    case "results":
      return input.results;
    default: {
      const unknownKind: never = input;
      throw new InputShapeError(`Unknown source input kind: ${JSON.stringify(unknownKind)}`);
    }
  }
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

// Counts code points so a surrogate pair is never split.
function truncate(text: string, charLimit: number): string {
  const chars = Array.from(text);
  return chars.length > charLimit ? chars.slice(0, charLimit).join("") + TRUNCATION_MARKER : text;
}

/**
 * Deduplicate sources by URL (first occurrence wins) and render them as a
 * prompt-ready "Sources:" block. With `includeRawContent`, each source also
 * carries its full text cut to roughly `maxTokensPerSource` tokens.
 */
export function deduplicateAndFormatSources(input: SourceInput, options: FormatSourcesOptions): string {
  const { maxTokensPerSource, includeRawContent = true } = options;
  if (!Number.isInteger(maxTokensPerSource) || maxTokensPerSource <= 0) {
    throw new InputShapeError(`maxTokensPerSource must be a positive integer, got: ${maxTokensPerSource}`);
  }

  const uniqueSources = new Map<string, SearchResult>();
  for (const source of flatten(input)) {
    if (!uniqueSources.has(source.url)) {
      uniqueSources.set(source.url, source);
    }
  }

  const charLimit = maxTokensPerSource * CHARS_PER_TOKEN;
  let formatted = "Sources:\n\n";
  for (const source of uniqueSources.values()) {
    formatted += `Source ${source.title}:\n===\n`;
    formatted += `URL: ${source.url}\n===\n`;
    formatted += `Most relevant content from source: ${source.content}\n===\n`;
    if (includeRawContent) {
      let rawContent = source.raw_content;
      if (rawContent == null) {
        log.warn({ url: source.url }, "No raw_content found for source");
        rawContent = "";
      }
      formatted += `Full source content limited to ${maxTokensPerSource} tokens: ${truncate(rawContent, charLimit)}\n\n`;
    }
  }

  return formatted.trim();
}

/** Render a citation list, one `* title : url` line per result, without deduplication. */
export function formatSources(response: SearchResponse): string {
  if (!Array.isArray(response.results)) {
    throw new InputShapeError("Search response has no 'results' list");
  }
  return response.results.map((source) => `* ${source.title} : ${source.url}`).join("\n");
}
