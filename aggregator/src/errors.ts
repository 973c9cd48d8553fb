export type ErrorKind = "validation" | "configuration" | "source_timeout" | "source_error" | "cache";

export type SourceName = "perplexity_sonar" | "serper_shopping";

export type SourceFailureReason =
  | "authentication_failed"
  | "rate_limited"
  | "bad_request"
  | "upstream_error"
  | "malformed_payload"
  | "network_error";

export class AggregatorError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind
  ) {
    super(message);
    this.name = "AggregatorError";
  }
}

/** Bad caller input, rejected before any cache or source is touched. */
export class ValidationError extends AggregatorError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, "validation");
    this.name = "ValidationError";
  }
}

/** A source the request needs has no credentials configured. */
export class ConfigurationError extends AggregatorError {
  constructor(message: string) {
    super(message, "configuration");
    this.name = "ConfigurationError";
  }
}

export class SourceTimeoutError extends AggregatorError {
  constructor(
    public readonly source: SourceName,
    public readonly timeoutMs: number
  ) {
    super(`${source} did not answer within ${timeoutMs}ms`, "source_timeout");
    this.name = "SourceTimeoutError";
  }
}

export class SourceError extends AggregatorError {
  constructor(
    public readonly source: SourceName,
    public readonly reason: SourceFailureReason,
    message: string,
    public readonly status?: number
  ) {
    super(`${source} ${reason}: ${message}`, "source_error");
    this.name = "SourceError";
  }
}

export class CacheError extends AggregatorError {
  constructor(
    public readonly operation: "get" | "set" | "ttl" | "decode" | "encode",
    message: string
  ) {
    super(`cache ${operation} failed: ${message}`, "cache");
    this.name = "CacheError";
  }
}

export function reasonForStatus(status: number | undefined): SourceFailureReason {
  if (status === 401 || status === 403) {
    return "authentication_failed";
  }
  if (status === 429) {
    return "rate_limited";
  }
  if (status === 400 || status === 422) {
    return "bad_request";
  }
  return "upstream_error";
}

export function isSourceFailure(error: unknown): error is SourceError | SourceTimeoutError {
  return error instanceof SourceError || error instanceof SourceTimeoutError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
