/**
 * Types for the filter grammar → OpenSearch Query DSL compiler.
 * Per https://docs.opensearch.org/latest/query-dsl/
 */

export type Scalar = string | number | boolean;

export type RangeOperator = "gt" | "gte" | "lt" | "lte";

export type RangeBounds = Partial<Record<RangeOperator, number>>;

export interface IdsClause {
  ids: { values: string[] };
}

export interface TermClause {
  term: Record<string, Scalar>;
}

export interface MatchClause {
  match: Record<string, string>;
}

export interface WildcardClause {
  wildcard: Record<string, string>;
}

export interface RangeClause {
  range: Record<string, RangeBounds>;
}

/** `field=null`: documents where the field is absent. */
export interface MissingFieldClause {
  bool: { must_not: { exists: { field: string } } };
}

/** OR over the two timestamp encodings carried by documents. */
export interface TimeWindowClause {
  bool: { should: RangeClause[]; minimum_should_match: number };
}

export type QueryClause =
  | IdsClause
  | TermClause
  | MatchClause
  | WildcardClause
  | RangeClause
  | MissingFieldClause
  | TimeWindowClause;

export interface BoolQuery {
  bool: { must: QueryClause[] };
}

export interface MatchAllQuery {
  match_all: Record<string, never>;
}

export interface CompiledQuery {
  query: BoolQuery | MatchAllQuery;
  size: number;
}

export interface BuildQueryInput {
  filters: string[];
  size: number;
  /** Relative window such as "12h", "7d" or "week"; empty for none. */
  timeframe?: string;
  /** Reference instant for the time window. Defaults to the wall clock. */
  now?: Date;
}

export interface LintMessage {
  level: "warn" | "error";
  message: string;
  path?: string;
}

export interface LintResult {
  ok: boolean;
  messages: LintMessage[];
}
