import { HistoryError } from "./errors.js";
import { INTERVALS, type DateRange, type Interval } from "./types.js";

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Upstream interval codes accepted as aliases of the canonical names */
const INTERVAL_ALIASES: Record<string, Interval> = {
  "1d": "daily",
  "1wk": "weekly",
  "1mo": "monthly",
  "3mo": "quarterly",
};

export const DEFAULT_INTERVAL: Interval = "daily";

function isInterval(value: string): value is Interval {
  return (INTERVALS as readonly string[]).includes(value);
}

/**
 * Check a YYYY-MM-DD string names a real calendar date.
 * Round-trips through Date.UTC so that 2023-02-30 is rejected instead of rolling over.
 */
export function isCalendarDate(value: string): boolean {
  const m = DATE_RE.exec(value);
  if (!m) return false;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

function parseDate(value: unknown, field: string): string {
  if (typeof value !== "string") {
    throw new HistoryError("InvalidDateFormat", `'${field}' must be a YYYY-MM-DD string`);
  }
  const trimmed = value.trim();
  if (!isCalendarDate(trimmed)) {
    throw new HistoryError(
      "InvalidDateFormat",
      `'${field}' must be a valid calendar date in YYYY-MM-DD format, got '${value}'`,
    );
  }
  return trimmed;
}

/** Resolve an interval name or upstream alias; omitted or blank means daily. */
export function parseInterval(value: unknown): Interval {
  if (value === undefined || value === null) return DEFAULT_INTERVAL;
  if (typeof value !== "string") {
    throw new HistoryError("InvalidInterval", "'interval' must be a string if provided");
  }
  const key = value.trim().toLowerCase();
  if (key === "") return DEFAULT_INTERVAL;
  if (isInterval(key)) return key;
  const alias = INTERVAL_ALIASES[key];
  if (alias) return alias;
  throw new HistoryError(
    "InvalidInterval",
    `Unsupported interval '${value}'. Expected one of: ${INTERVALS.join(", ")}`,
  );
}

/**
 * Validate a requested window. Equal dates are a single-day window.
 * Throws InvalidDateFormat, InvalidDateRange or InvalidInterval.
 */
export function validateRange(start: unknown, end: unknown, interval?: unknown): DateRange {
  const startDate = parseDate(start, "start_date");
  const endDate = parseDate(end, "end_date");
  // Zero-padded ISO dates order lexicographically
  if (startDate > endDate) {
    throw new HistoryError(
      "InvalidDateRange",
      `'start_date' (${startDate}) must not be after 'end_date' (${endDate})`,
    );
  }
  return { start: startDate, end: endDate, interval: parseInterval(interval) };
}

/** Add whole days to a YYYY-MM-DD date. */
export function addDays(date: string, days: number): string {
  const d = new Date(`${date}T00:00:00.000Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}
