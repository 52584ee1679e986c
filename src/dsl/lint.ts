/**
 * Linter for compiled queries.
 * Checks clauses against the field cache and emits warnings/errors.
 */

import { isNumericOrDate } from "../fields/cache";
import type { FieldCache } from "../fields/cache";
import type { CompiledQuery, LintMessage, LintResult } from "./types";
import { scanWildcards } from "./values";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstField(body: unknown): string | undefined {
  return isRecord(body) ? Object.keys(body)[0] : undefined;
}

function walkQuery(
  obj: unknown,
  path: string,
  cache: FieldCache | undefined,
  messages: LintMessage[]
): void {
  if (!isRecord(obj)) return;

  function checkField(field: string, subPath: string): void {
    if (!cache) return;
    const info = cache.get(field);
    if (!info) {
      messages.push({
        level: "warn",
        message: `field "${field}" has no cached metadata`,
        path: subPath,
      });
      return;
    }
    if (!info.searchable) {
      messages.push({
        level: "error",
        message: `field "${field}" is not searchable`,
        path: subPath,
      });
    }
  }

  const term = obj.term;
  if (term !== undefined) {
    const field = firstField(term);
    if (field) {
      checkField(field, `${path}.term`);
      if (cache?.get(field)?.type === "text") {
        messages.push({
          level: "warn",
          message: `term used on text field "${field}" - consider match`,
          path: `${path}.term`,
        });
      }
    }
  }

  const match = obj.match;
  if (match !== undefined) {
    const field = firstField(match);
    if (field) checkField(field, `${path}.match`);
  }

  const wildcard = obj.wildcard;
  if (isRecord(wildcard)) {
    const field = firstField(wildcard);
    if (field) {
      checkField(field, `${path}.wildcard`);
      const pattern = wildcard[field];
      if (typeof pattern === "string" && scanWildcards(pattern).leading !== undefined) {
        messages.push({
          level: "error",
          message: `wildcard on "${field}" starts with a wildcard`,
          path: `${path}.wildcard`,
        });
      }
    }
  }

  const range = obj.range;
  if (range !== undefined) {
    const field = firstField(range);
    if (field) {
      checkField(field, `${path}.range`);
      const info = cache?.get(field);
      if (info && !isNumericOrDate(info.type)) {
        messages.push({
          level: "error",
          message: `range used on non-numeric/date field "${field}" (type: ${info.type})`,
          path: `${path}.range`,
        });
      }
    }
  }

  const exists = obj.exists;
  if (isRecord(exists) && typeof exists.field === "string") {
    checkField(exists.field, `${path}.exists`);
  }

  const bool = obj.bool;
  if (isRecord(bool)) {
    for (const k of ["must", "should"]) {
      const arr = bool[k];
      if (Array.isArray(arr)) {
        arr.forEach((item, i) => walkQuery(item, `${path}.bool.${k}[${i}]`, cache, messages));
      }
    }
    const mustNot = bool.must_not;
    if (mustNot !== undefined) {
      walkQuery(mustNot, `${path}.bool.must_not`, cache, messages);
    }
  }
}

/**
 * Lint a compiled query for clauses the engine would reject or mis-evaluate.
 */
export function lintQuery(dsl: CompiledQuery, cache?: FieldCache): LintResult {
  const messages: LintMessage[] = [];

  walkQuery(dsl.query, "query", cache, messages);

  const hasError = messages.some((m) => m.level === "error");
  return {
    ok: !hasError,
    messages,
  };
}
