/**
 * Filter grammar → OpenSearch Query DSL compiler.
 * Per https://docs.opensearch.org/latest/query-dsl/
 * Pure JSON builder, no I/O: the only input besides the tokens is a field cache.
 */

import { FilterCompileError, ParseError, QueryBuildError, formatError } from "../errors";
import type { IndexedParseError } from "../errors";
import { DEFAULT_FIELD_METADATA, isNumericOrDate, isNumericType } from "../fields/cache";
import type { FieldCache } from "../fields/cache";
import type { FieldMetadata } from "../fields/types";
import { buildTimeQuery } from "./timeframe";
import type {
  BuildQueryInput,
  CompiledQuery,
  IdsClause,
  MatchClause,
  MissingFieldClause,
  QueryClause,
  RangeBounds,
  RangeClause,
  RangeOperator,
  Scalar,
  TermClause,
  WildcardClause,
} from "./types";
import {
  isNullValue,
  isValidFieldName,
  parseDateValue,
  parseNumber,
  scanWildcards,
  unescapeValue,
} from "./values";

const ID_PREFIX = "_id=";
const DEDUP_FIELD = "detection_id_dedup";
const DEDUP_PREFIX = `${DEDUP_FIELD}=`;

const RANGE_OPERATORS: Record<string, RangeOperator> = {
  ">": "gt",
  ">=": "gte",
  "<": "lt",
  "<=": "lte",
};

function resolveField(cache: FieldCache | undefined, field: string): FieldMetadata {
  return cache ? cache.resolve(field) : DEFAULT_FIELD_METADATA;
}

function buildIds(value: string): IdsClause {
  return {
    ids: { values: [value] },
  };
}

function buildTerm(field: string, value: Scalar): TermClause {
  return {
    term: { [field]: value },
  };
}

function buildMatch(field: string, value: string): MatchClause {
  return {
    match: { [field]: value },
  };
}

function buildWildcard(field: string, value: string): WildcardClause {
  return {
    wildcard: { [field]: value },
  };
}

function buildRange(field: string, op: RangeOperator, value: number): RangeClause {
  const bounds: RangeBounds = {};
  bounds[op] = value;
  return {
    range: {
      [field]: bounds,
    },
  };
}

function buildMissing(field: string): MissingFieldClause {
  return {
    bool: {
      must_not: { exists: { field } },
    },
  };
}

function requireSearchable(field: string, meta: FieldMetadata): void {
  if (!meta.searchable) {
    throw new ParseError(field, "field is not searchable");
  }
}

/**
 * `field<op>value` where the first `<` or `>` starts the operator.
 * Returns undefined when the token has neither character.
 */
function parseRangeSyntax(filter: string, cache: FieldCache | undefined): RangeClause | undefined {
  const opStart = filter.search(/[<>]/);
  if (opStart === -1) return undefined;

  const field = filter.slice(0, opStart).trim();
  if (!isValidFieldName(field)) {
    throw new ParseError(field, "invalid field name in range query");
  }

  let opEnd = opStart + 1;
  const next = filter.charAt(opEnd);
  if (next === "=" || next === ">") opEnd++;

  const op = RANGE_OPERATORS[filter.slice(opStart, opEnd)];
  if (!op) {
    throw new ParseError(field, "invalid range operator");
  }

  const value = filter.slice(opEnd).trim();
  if (value === "") {
    throw new ParseError(field, "missing value in range query");
  }

  const meta = resolveField(cache, field);
  requireSearchable(field, meta);
  if (!isNumericOrDate(meta.type)) {
    throw new ParseError(field, `range query requires a numeric or date field, got '${meta.type}'`);
  }

  if (meta.type === "date") {
    const millis = parseDateValue(value);
    if (millis === undefined) {
      throw new ParseError(field, `invalid date value in range query: ${value}`);
    }
    return buildRange(field, op, millis);
  }

  const num = parseNumber(value);
  if (num === undefined) {
    throw new ParseError(field, `invalid numeric value in range query: ${value}`);
  }
  return buildRange(field, op, num);
}

function parseTextTerm(field: string, value: string): QueryClause {
  if (isNullValue(value)) {
    return buildMissing(field);
  }

  const scan = scanWildcards(value);
  if (scan.leading !== undefined) {
    throw new ParseError(field, `wildcard query cannot start with ${scan.leading}`);
  }
  if (scan.hasWildcard) {
    return buildWildcard(field, unescapeValue(value));
  }
  return buildMatch(field, unescapeValue(value));
}

/**
 * `field=value`, dispatched on the cached type of `field`.
 */
function parseEquality(filter: string, cache: FieldCache | undefined): QueryClause {
  const eq = filter.indexOf("=");
  if (eq === -1) {
    throw new ParseError(filter, "invalid filter format, expected 'field=value' or range query");
  }

  const field = filter.slice(0, eq).trim();
  const value = filter.slice(eq + 1).trim();

  if (!isValidFieldName(field)) {
    throw new ParseError(field, "invalid field name");
  }

  const meta = resolveField(cache, field);
  requireSearchable(field, meta);

  if (isNumericType(meta.type)) {
    const num = parseNumber(value);
    if (num === undefined) throw new ParseError(field, `invalid numeric value: ${value}`);
    return buildTerm(field, num);
  }

  switch (meta.type) {
    case "date": {
      const millis = parseDateValue(value);
      if (millis === undefined) throw new ParseError(field, `invalid date value: ${value}`);
      return buildTerm(field, millis);
    }
    case "boolean": {
      const lower = value.toLowerCase();
      if (lower !== "true" && lower !== "false") {
        throw new ParseError(field, `invalid boolean value: ${value}`);
      }
      return buildTerm(field, lower === "true");
    }
    default:
      return parseTextTerm(field, value);
  }
}

/**
 * Compile one filter token into a query clause. Throws ParseError.
 */
export function parseFilter(token: string, cache?: FieldCache): QueryClause {
  const filter = token.trim();
  if (filter === "") {
    throw new ParseError("", "empty filter");
  }

  if (filter.startsWith(ID_PREFIX)) {
    return buildIds(filter.slice(ID_PREFIX.length).trim());
  }
  if (filter.startsWith(DEDUP_PREFIX)) {
    return buildTerm(DEDUP_FIELD, filter.slice(DEDUP_PREFIX.length).trim());
  }

  return parseRangeSyntax(filter, cache) ?? parseEquality(filter, cache);
}

/**
 * Compile filters, size and timeframe into one request body.
 * All-or-nothing: one bad filter fails the whole query, and every bad filter
 * is reported.
 */
export function buildQuery(input: BuildQueryInput, cache?: FieldCache): CompiledQuery {
  const { filters, size, timeframe = "", now = new Date() } = input;

  if (!Number.isInteger(size) || size < 0) {
    throw new QueryBuildError(`size must be non-negative, got ${size}`);
  }

  const must: QueryClause[] = [];

  if (timeframe.trim() !== "") {
    try {
      const timeClause = buildTimeQuery(timeframe, now);
      if (timeClause) must.push(timeClause);
    } catch (err) {
      throw new QueryBuildError(`error building time query: ${formatError(err)}`, { cause: err });
    }
  }

  const errors: IndexedParseError[] = [];
  filters.forEach((filter, index) => {
    try {
      must.push(parseFilter(filter, cache));
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      errors.push({ index, error: err });
    }
  });
  if (errors.length > 0) {
    throw new FilterCompileError(errors);
  }

  if (must.length === 0) {
    return { size, query: { match_all: {} } };
  }
  return { size, query: { bool: { must } } };
}
