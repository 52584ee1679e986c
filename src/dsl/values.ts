/**
 * Lexical helpers for filter values: escaping, wildcards and typed literals.
 */

const FIELD_NAME = /^[a-zA-Z][a-zA-Z0-9_-]*(?:\.[a-zA-Z][a-zA-Z0-9_-]*)*$/;

const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

const INTEGER = /^[+-]?\d+$/;

const RFC3339 =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:[Zz]|[+-](\d{2}):(\d{2}))$/;

/** Above this magnitude a Unix timestamp is read as milliseconds. */
const MILLIS_THRESHOLD = 1e12;

const UNESCAPABLE = new Set(["\\", "*", "?", "="]);

/**
 * Letter, then letters, digits, `_` or `-`; dot-separated segments of the same shape.
 */
export function isValidFieldName(field: string): boolean {
  return FIELD_NAME.test(field);
}

export function isNullValue(value: string): boolean {
  const lower = value.toLowerCase();
  return lower === "null" || lower === "nil";
}

/**
 * Drop the backslash in front of `\`, `*`, `?` and `=`. Other escapes keep
 * their backslash; a trailing lone backslash is kept.
 */
export function unescapeValue(value: string): string {
  if (!value.includes("\\")) return value;

  let out = "";
  let escaped = false;
  for (const ch of value) {
    if (escaped) {
      out += UNESCAPABLE.has(ch) ? ch : `\\${ch}`;
      escaped = false;
    } else if (ch === "\\") {
      escaped = true;
    } else {
      out += ch;
    }
  }
  if (escaped) out += "\\";
  return out;
}

export interface WildcardScan {
  /** An unescaped `*` or `?` occurs somewhere in the value. */
  hasWildcard: boolean;
  /** The unescaped wildcard that opens the value, if any. */
  leading?: string;
}

export function scanWildcards(value: string): WildcardScan {
  let escaped = false;
  let hasWildcard = false;
  let leading: string | undefined;
  let position = 0;

  for (const ch of value) {
    if (escaped) {
      escaped = false;
    } else if (ch === "\\") {
      escaped = true;
    } else if (ch === "*" || ch === "?") {
      if (position === 0) leading = ch;
      hasWildcard = true;
    }
    position++;
  }
  return leading === undefined ? { hasWildcard } : { hasWildcard, leading };
}

/**
 * Finite decimal number, or undefined. Hex, underscores, Infinity and NaN are rejected.
 */
export function parseNumber(value: string): number | undefined {
  if (!DECIMAL.test(value)) return undefined;
  const num = Number(value);
  return Number.isFinite(num) ? num : undefined;
}

/**
 * Epoch milliseconds from an integer Unix timestamp (seconds, or milliseconds
 * above 1e12) or an RFC 3339 date-time.
 */
export function parseDateValue(value: string): number | undefined {
  if (INTEGER.test(value)) {
    const num = Number(value);
    if (!Number.isSafeInteger(num)) return undefined;
    return Math.abs(num) > MILLIS_THRESHOLD ? num : num * 1000;
  }
  const match = RFC3339.exec(value);
  if (match && hasValidDateTimeFields(match)) {
    const millis = Date.parse(value.toUpperCase());
    return Number.isNaN(millis) ? undefined : millis;
  }
  return undefined;
}

function daysInMonth(year: number, month: number): number {
  const date = new Date(0);
  date.setUTCFullYear(year, month, 0);
  return date.getUTCDate();
}

/**
 * `Date.parse` rolls impossible fields over (Feb 30 → Mar 1), so bound them first.
 */
function hasValidDateTimeFields(match: RegExpExecArray): boolean {
  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  const offsetHour = Number(match[7] ?? 0);
  const offsetMinute = Number(match[8] ?? 0);
  return (
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month) &&
    hour <= 23 &&
    minute <= 59 &&
    second <= 59 &&
    offsetHour <= 23 &&
    offsetMinute <= 59
  );
}
