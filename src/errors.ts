export class WebSearchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "WebSearchError";
  }
}

/** Network, HTTP-status or response-parsing failure from a provider. */
export class SearchProviderError extends WebSearchError {
  constructor(message: string, cause?: Error) {
    super(message, "SEARCH_PROVIDER_ERROR", cause);
    this.name = "SearchProviderError";
  }
}

export class ConfigurationError extends WebSearchError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}

export class UnsupportedProviderError extends WebSearchError {
  constructor(public readonly provider: string) {
    super(`Unsupported search provider: ${provider}`, "UNSUPPORTED_PROVIDER");
    this.name = "UnsupportedProviderError";
  }
}

export class InputShapeError extends WebSearchError {
  constructor(message: string) {
    super(message, "INPUT_SHAPE_ERROR");
    this.name = "InputShapeError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
