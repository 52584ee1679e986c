/**
 * Error types raised by the filter compiler, timeframe resolver and search session.
 * Messages are plain, human-readable strings; there are no error codes.
 */

export class SearchCoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * One malformed filter token.
 */
export class ParseError extends SearchCoreError {
  readonly field: string;
  readonly reason: string;

  constructor(field: string, reason: string) {
    super(`parse error on field '${field}': ${reason}`);
    this.field = field;
    this.reason = reason;
  }
}

export interface IndexedParseError {
  index: number;
  error: ParseError;
}

/**
 * Every filter that failed in one compilation, in input order.
 */
export class FilterCompileError extends SearchCoreError {
  readonly errors: IndexedParseError[];

  constructor(errors: IndexedParseError[]) {
    const joined = errors.map(({ index, error }) => `filter[${index}]: ${error.message}`).join("; ");
    super(`failed to parse filters: ${joined}`);
    this.errors = errors;
  }
}

export class TimeframeError extends SearchCoreError {}

/**
 * Query construction failed before any filter was looked at (bad size or timeframe).
 */
export class QueryBuildError extends SearchCoreError {}

export class FieldCapabilitiesError extends SearchCoreError {
  readonly index: string;

  constructor(index: string, cause: unknown) {
    super(`field capabilities request for '${index}' failed: ${formatError(cause)}`, { cause });
    this.index = index;
  }
}

export class ConfigError extends SearchCoreError {}

/**
 * Thrown by a SearchExecutor when the engine answers with a throttling response (HTTP 429).
 */
export class SearchThrottledError extends SearchCoreError {
  constructor(message = "search request was throttled") {
    super(message);
  }
}

export class RetriesExhaustedError extends SearchCoreError {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`search still throttled after ${attempts} attempts`, { cause });
    this.attempts = attempts;
  }
}

export class RateLimitAbortedError extends SearchCoreError {
  constructor(cause?: unknown) {
    super("wait for rate limit slot was aborted", { cause });
  }
}

export function isThrottlingError(err: unknown): boolean {
  if (err instanceof SearchThrottledError) return true;
  if (typeof err === "object" && err !== null && "statusCode" in err) {
    return err.statusCode === 429;
  }
  return false;
}

/**
 * Render any thrown value as a single line.
 */
export function formatError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
