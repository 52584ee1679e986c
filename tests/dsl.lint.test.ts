import { describe, it, expect } from "vitest";
import { buildQuery, lintQuery } from "../src/dsl/index";
import type { CompiledQuery } from "../src/dsl/types";
import { createTestFieldCache, FIXED_NOW } from "./field-cache.fixture";

const cache = createTestFieldCache();

describe("lintQuery", () => {
  it("returns ok for match_all", () => {
    const result = lintQuery({ size: 0, query: { match_all: {} } }, cache);
    expect(result).toEqual({ ok: true, messages: [] });
  });

  it("returns ok for a query compiled against the same cache", () => {
    const dsl = buildQuery({ filters: ["age>=21", "name=jo*", "status=null"], size: 10 }, cache);
    expect(lintQuery(dsl, cache)).toEqual({ ok: true, messages: [] });
  });

  it("skips field checks without a cache", () => {
    const dsl = buildQuery({ filters: ["whatever=x"], size: 10 });
    expect(lintQuery(dsl)).toEqual({ ok: true, messages: [] });
  });

  it("warns about fields with no cached metadata", () => {
    const dsl = buildQuery({ filters: ["unknown=x"], size: 10 });
    expect(lintQuery(dsl, cache)).toEqual({
      ok: true,
      messages: [
        {
          level: "warn",
          message: 'field "unknown" has no cached metadata',
          path: "query.bool.must[0].match",
        },
      ],
    });
  });

  it("warns about the time window fields when the cache lacks them", () => {
    const dsl = buildQuery({ filters: [], size: 10, timeframe: "1h", now: FIXED_NOW }, cache);
    const paths = lintQuery(dsl, cache).messages.map((m) => m.path);
    expect(paths).toEqual([
      "query.bool.must[0].bool.should[0].range",
      "query.bool.must[0].bool.should[1].range",
    ]);
  });

  it("flags range on a keyword field", () => {
    const dsl: CompiledQuery = {
      size: 10,
      query: { bool: { must: [{ range: { status: { gt: 1 } } }] } },
    };
    const result = lintQuery(dsl, cache);
    expect(result.ok).toBe(false);
    expect(result.messages).toContainEqual({
      level: "error",
      message: 'range used on non-numeric/date field "status" (type: keyword)',
      path: "query.bool.must[0].range",
    });
  });

  it("flags a non-searchable field inside must_not", () => {
    const dsl: CompiledQuery = {
      size: 10,
      query: { bool: { must: [{ bool: { must_not: { exists: { field: "secret" } } } }] } },
    };
    expect(lintQuery(dsl, cache)).toEqual({
      ok: false,
      messages: [
        {
          level: "error",
          message: 'field "secret" is not searchable',
          path: "query.bool.must[0].bool.must_not.exists",
        },
      ],
    });
  });

  it("flags a leading wildcard", () => {
    const dsl: CompiledQuery = {
      size: 10,
      query: { bool: { must: [{ wildcard: { name: "*x" } }] } },
    };
    expect(lintQuery(dsl, cache).messages).toEqual([
      { level: "error", message: 'wildcard on "name" starts with a wildcard', path: "query.bool.must[0].wildcard" },
    ]);
  });

  it("warns about term on a text field", () => {
    const dsl: CompiledQuery = {
      size: 10,
      query: { bool: { must: [{ term: { description: "x" } }] } },
    };
    expect(lintQuery(dsl, cache)).toEqual({
      ok: true,
      messages: [
        {
          level: "warn",
          message: 'term used on text field "description" - consider match',
          path: "query.bool.must[0].term",
        },
      ],
    });
  });
});
