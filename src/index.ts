export * from "./dsl";

export { FieldCache, DEFAULT_FIELD_METADATA, isNumericOrDate, isNumericType } from "./fields/cache";
export { collectFieldPaths, collectFieldSet } from "./fields/documents";
export { FieldSelectionState } from "./fields/selection";
export type {
  FieldCapabilitiesResponse,
  FieldCapability,
  FieldMetadata,
  KnownFieldType,
  NumericFieldType,
  SearchDocument,
} from "./fields/types";

export { RateLimiter } from "./search/rate-limiter";
export type { Clock } from "./search/rate-limiter";
export { SearchSession } from "./search/session";
export type { SearchSessionOptions } from "./search/session";
export type {
  FieldCapabilitiesProvider,
  IndexLister,
  SearchExecutor,
  SearchOutcome,
  SearchPage,
  SearchRequest,
} from "./search/types";

export {
  DEFAULT_RATE_LIMIT_CONFIG,
  DEFAULT_SEARCH_CONFIG,
  resolveRateLimitConfig,
  resolveSearchConfig,
} from "./config";
export type { RateLimitConfig, SearchConfig } from "./config";

export {
  ConfigError,
  FieldCapabilitiesError,
  FilterCompileError,
  ParseError,
  QueryBuildError,
  RateLimitAbortedError,
  RetriesExhaustedError,
  SearchCoreError,
  SearchThrottledError,
  TimeframeError,
  formatError,
  isThrottlingError,
} from "./errors";
export type { IndexedParseError } from "./errors";

export { noopLogger } from "./logger";
export type { Logger } from "./logger";
