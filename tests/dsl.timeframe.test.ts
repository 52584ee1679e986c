import { describe, it, expect } from "vitest";
import { buildTimeQuery, parseTimeframe, validateTimeframe } from "../src/dsl/index";
import { TimeframeError } from "../src/errors";
import { FIXED_NOW, FIXED_NOW_MS, FIXED_NOW_SEC } from "./field-cache.fixture";

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;

describe("validateTimeframe", () => {
  it.each(["today", "week", "month", "quarter", "year", " Week ", "12h", "7d", "2w", "12H", "30D"])(
    "accepts %j",
    (tf) => {
      expect(() => validateTimeframe(tf)).not.toThrow();
    }
  );

  it.each([
    ["", "timeframe cannot be empty"],
    ["   ", "timeframe cannot be empty"],
    ["h", "invalid timeframe format: h"],
    ["12x", "invalid timeframe unit: x (supported: h,d,w)"],
    ["0h", "invalid timeframe number: 0h"],
    ["-5h", "invalid timeframe number: -5h"],
    ["1.5d", "invalid timeframe number: 1.5d"],
    ["weeks", "invalid timeframe 'weeks': did you mean 'week'?"],
    ["Todayy", "invalid timeframe 'Todayy': did you mean 'today'?"],
    ["year2", "invalid timeframe 'year2': did you mean 'year'?"],
  ])("rejects %j", (tf, message) => {
    expect(() => validateTimeframe(tf)).toThrow(new TimeframeError(message));
  });
});

describe("parseTimeframe", () => {
  it.each([
    ["week", 7 * DAY],
    ["month", 30 * DAY],
    ["quarter", 90 * DAY],
    ["year", 365 * DAY],
    ["12h", 12 * HOUR],
    ["3d", 3 * DAY],
    ["2W", 14 * DAY],
  ])("resolves %s", (tf, want) => {
    expect(parseTimeframe(tf)).toBe(want);
  });

  it("resolves week to 168 hours", () => {
    expect(parseTimeframe("week")).toBe(168 * HOUR);
  });

  it("measures today from local midnight of the reference", () => {
    const reference = new Date(2024, 9, 4, 13, 30, 0);
    expect(parseTimeframe("today", reference)).toBe(13.5 * HOUR);
  });

  it("is zero right at local midnight", () => {
    expect(parseTimeframe("today", new Date(2024, 9, 4))).toBe(0);
  });

  it("throws on invalid input", () => {
    expect(() => parseTimeframe("12x")).toThrow(TimeframeError);
  });
});

describe("buildTimeQuery", () => {
  it("returns undefined for an empty timeframe", () => {
    expect(buildTimeQuery("", FIXED_NOW)).toBeUndefined();
  });

  it("returns undefined for a whitespace-only timeframe that validation rejects", () => {
    expect(buildTimeQuery(" \t ", FIXED_NOW)).toBeUndefined();
    expect(() => validateTimeframe(" \t ")).toThrow("timeframe cannot be empty");
  });

  it("covers both timestamp encodings", () => {
    expect(buildTimeQuery("week", FIXED_NOW)).toEqual({
      bool: {
        should: [
          { range: { unixTime: { gte: FIXED_NOW_SEC - 7 * 86400, lte: FIXED_NOW_SEC } } },
          { range: { detectionGeneratedTime: { gte: FIXED_NOW_MS - 7 * DAY, lte: FIXED_NOW_MS } } },
        ],
        minimum_should_match: 1,
      },
    });
  });

  it("truncates sub-second remainders in the seconds window", () => {
    const now = new Date(FIXED_NOW_MS + 999);
    const clause = buildTimeQuery("1h", now);
    expect(clause?.bool.should[0]).toEqual({
      range: { unixTime: { gte: FIXED_NOW_SEC - 3600, lte: FIXED_NOW_SEC } },
    });
    expect(clause?.bool.should[1]).toEqual({
      range: { detectionGeneratedTime: { gte: FIXED_NOW_MS + 999 - HOUR, lte: FIXED_NOW_MS + 999 } },
    });
  });

  it("resolves today against the given instant", () => {
    const now = new Date(2024, 9, 4, 6, 0, 0);
    const clause = buildTimeQuery("today", now);
    const nowMs = now.getTime();
    expect(clause?.bool.should[1]).toEqual({
      range: { detectionGeneratedTime: { gte: nowMs - 6 * HOUR, lte: nowMs } },
    });
  });

  it("throws TimeframeError for an invalid timeframe", () => {
    expect(() => buildTimeQuery("soon", FIXED_NOW)).toThrow(TimeframeError);
  });
});
