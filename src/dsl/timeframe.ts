/**
 * Relative timeframes ("12h", "7d", "week", "today") → absolute range clauses.
 */

import { TimeframeError } from "../errors";
import type { RangeClause, TimeWindowClause } from "./types";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export const TIMEFRAME_KEYWORDS = ["today", "week", "month", "quarter", "year"] as const;

export type TimeframeKeyword = (typeof TIMEFRAME_KEYWORDS)[number];

const FIXED_KEYWORD_DAYS: Record<Exclude<TimeframeKeyword, "today">, number> = {
  week: 7,
  month: 30,
  quarter: 90,
  year: 365,
};

const UNIT_MS: Record<string, number> = {
  h: HOUR_MS,
  d: DAY_MS,
  w: 7 * DAY_MS,
};

/** Documents carry their timestamp in one of these two fields. */
export const UNIX_SECONDS_FIELD = "unixTime";
export const UNIX_MILLIS_FIELD = "detectionGeneratedTime";

function isKeyword(value: string): value is TimeframeKeyword {
  return (TIMEFRAME_KEYWORDS as readonly string[]).includes(value);
}

function normalize(timeframe: string): string {
  return timeframe.trim().toLowerCase();
}

/**
 * Throws TimeframeError unless the input is a keyword or `<positive int><h|d|w>`.
 * A blank input is rejected here; `buildTimeQuery` and `buildQuery` read a
 * blank timeframe as "no time window" and never validate it.
 */
export function validateTimeframe(timeframe: string): void {
  const tf = normalize(timeframe);
  if (tf === "") {
    throw new TimeframeError("timeframe cannot be empty");
  }
  if (isKeyword(tf)) return;

  const typo = TIMEFRAME_KEYWORDS.find((keyword) => tf.startsWith(keyword));
  if (typo) {
    throw new TimeframeError(`invalid timeframe '${timeframe.trim()}': did you mean '${typo}'?`);
  }

  if (tf.length < 2) {
    throw new TimeframeError(`invalid timeframe format: ${tf}`);
  }

  const unit = tf.slice(-1);
  if (!(unit in UNIT_MS)) {
    throw new TimeframeError(`invalid timeframe unit: ${unit} (supported: h,d,w)`);
  }

  const digits = tf.slice(0, -1);
  if (!/^\d+$/.test(digits) || Number(digits) <= 0) {
    throw new TimeframeError(`invalid timeframe number: ${tf}`);
  }
}

function startOfLocalDay(reference: Date): Date {
  return new Date(reference.getFullYear(), reference.getMonth(), reference.getDate());
}

/**
 * Duration in milliseconds. `today` is the time elapsed since local midnight
 * of `reference`; the other keywords are fixed day counts.
 */
export function parseTimeframe(timeframe: string, reference: Date = new Date()): number {
  validateTimeframe(timeframe);
  const tf = normalize(timeframe);

  if (tf === "today") {
    return reference.getTime() - startOfLocalDay(reference).getTime();
  }
  if (isKeyword(tf) && tf !== "today") {
    return FIXED_KEYWORD_DAYS[tf] * DAY_MS;
  }

  const unitMs = UNIT_MS[tf.slice(-1)] ?? HOUR_MS;
  return Number(tf.slice(0, -1)) * unitMs;
}

function buildWindow(field: string, gte: number, lte: number): RangeClause {
  return {
    range: {
      [field]: { gte, lte },
    },
  };
}

/**
 * Time window clause ending at `now`, or undefined for an empty or
 * whitespace-only timeframe.
 */
export function buildTimeQuery(timeframe: string, now: Date): TimeWindowClause | undefined {
  if (timeframe.trim() === "") return undefined;

  const durationMs = parseTimeframe(timeframe, now);
  const nowMs = now.getTime();
  const nowSec = Math.floor(nowMs / 1000);

  return {
    bool: {
      should: [
        buildWindow(UNIX_SECONDS_FIELD, nowSec - Math.floor(durationMs / 1000), nowSec),
        buildWindow(UNIX_MILLIS_FIELD, nowMs - durationMs, nowMs),
      ],
      minimum_should_match: 1,
    },
  };
}
