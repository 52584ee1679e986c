import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { buildQuery, parseFilter } from "../src/dsl/index";
import { QueryBuildError } from "../src/errors";
import { FieldSelectionState } from "../src/fields/selection";
import { FIXED_NOW } from "./field-cache.fixture";

const NUM_RUNS = 200;

const fieldArb = fc.stringMatching(/^[a-z][a-z0-9_]{0,8}$/);
const plainValueArb = fc.stringMatching(/^[a-zA-Z0-9 ]{1,12}$/);
const filterArb = fc.tuple(fieldArb, plainValueArb).map(([field, value]) => `${field}=${value}`);

describe("filter compiler properties", () => {
  it("never rejects a plain value on an uncached field", () => {
    fc.assert(
      fc.property(filterArb, (filter) => {
        expect(() => parseFilter(filter)).not.toThrow();
      }),
      { numRuns: NUM_RUNS }
    );
  });

  it("emits one clause per filter, in order, after an optional time window", () => {
    fc.assert(
      fc.property(
        fc.array(filterArb, { maxLength: 6 }),
        fc.constantFrom("", "1h", "24h", "7d", "week"),
        (filters, timeframe) => {
          const result = buildQuery({ filters, size: 10, timeframe, now: FIXED_NOW });
          const expected = filters.map((filter) => parseFilter(filter));
          const prefix = timeframe === "" ? 0 : 1;

          if (filters.length + prefix === 0) {
            expect(result.query).toEqual({ match_all: {} });
            return;
          }
          if (!("bool" in result.query)) throw new Error("expected a bool query");
          expect(result.query.bool.must).toHaveLength(filters.length + prefix);
          expect(result.query.bool.must.slice(prefix)).toEqual(expected);
        }
      ),
      { numRuns: NUM_RUNS }
    );
  });

  it("rejects every negative size", () => {
    fc.assert(
      fc.property(fc.integer({ max: -1 }), fc.array(filterArb, { maxLength: 3 }), (size, filters) => {
        expect(() => buildQuery({ filters, size })).toThrow(QueryBuildError);
      }),
      { numRuns: NUM_RUNS }
    );
  });

  it("treats values whose wildcards are all escaped as literal matches", () => {
    const pieceArb = fc.constantFrom("a", "b", "7", "\\*", "\\?");
    fc.assert(
      fc.property(fc.array(pieceArb, { minLength: 1, maxLength: 8 }), (pieces) => {
        const raw = pieces.join("");
        const literal = raw.replace(/\\([*?])/g, "$1");
        expect(parseFilter(`name=${raw}`)).toEqual({ match: { name: literal } });
      }),
      { numRuns: NUM_RUNS }
    );
  });
});

describe("field selection properties", () => {
  type Op =
    | { kind: "docs"; fields: string[] }
    | { kind: "toggle"; field: string }
    | { kind: "move"; field: string; up: boolean };

  const nameArb = fc.constantFrom("a", "b", "c", "d", "e");
  const opArb: fc.Arbitrary<Op> = fc.oneof(
    fc.record({ kind: fc.constant("docs" as const), fields: fc.array(nameArb, { maxLength: 5 }) }),
    fc.record({ kind: fc.constant("toggle" as const), field: nameArb }),
    fc.record({ kind: fc.constant("move" as const), field: nameArb, up: fc.boolean() })
  );

  it("keeps selected fields discovered and listed exactly once", () => {
    fc.assert(
      fc.property(fc.array(opArb, { maxLength: 30 }), (ops) => {
        const state = new FieldSelectionState();
        for (const op of ops) {
          switch (op.kind) {
            case "docs":
              state.updateFromDocuments(op.fields.map((field) => ({ [field]: 1 })));
              break;
            case "toggle":
              state.toggleField(op.field);
              break;
            case "move":
              state.moveField(op.field, op.up);
              break;
          }

          const discovered = new Set(state.getDiscoveredFields());
          const ordered = state.getOrderedSelectedFields();
          expect(new Set(ordered).size).toBe(ordered.length);
          for (const field of ordered) {
            expect(discovered.has(field)).toBe(true);
            expect(state.isFieldSelected(field)).toBe(true);
          }
          for (const field of state.getFilteredFields()) {
            expect(state.isFieldSelected(field)).toBe(false);
          }
        }
      }),
      { numRuns: NUM_RUNS }
    );
  });
});
