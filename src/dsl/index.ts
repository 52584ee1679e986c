/**
 * Filter grammar → OpenSearch Query DSL.
 * Per https://docs.opensearch.org/latest/query-dsl/
 */

export type {
  Scalar,
  RangeOperator,
  RangeBounds,
  IdsClause,
  TermClause,
  MatchClause,
  WildcardClause,
  RangeClause,
  MissingFieldClause,
  TimeWindowClause,
  QueryClause,
  BoolQuery,
  MatchAllQuery,
  CompiledQuery,
  BuildQueryInput,
  LintMessage,
  LintResult,
} from "./types";

export { buildQuery, parseFilter } from "./compiler";
export { lintQuery } from "./lint";
export {
  TIMEFRAME_KEYWORDS,
  UNIX_MILLIS_FIELD,
  UNIX_SECONDS_FIELD,
  buildTimeQuery,
  parseTimeframe,
  validateTimeframe,
} from "./timeframe";
export type { TimeframeKeyword } from "./timeframe";
export { isValidFieldName, unescapeValue } from "./values";

/**
 * Pretty-print a compiled query as a JSON string.
 */
export function stringifyQuery(dsl: { query: unknown; size?: number }): string {
  return JSON.stringify(dsl, null, 2);
}
