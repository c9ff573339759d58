import { z } from "zod";
import { HistoryError } from "./errors.js";
import { validateRange } from "./range.js";
import type { HistoricalQuery } from "./types.js";

/** Stock/index symbol — alphanumeric, dots, hyphens, carets, max 20 chars */
const SYMBOL_RE = /^[A-Z0-9.\-^=%]{1,20}$/;

/**
 * Field presence and primitive types only. Date and interval contents are
 * left to validateRange so their failures keep their own error kinds.
 */
const historicalRequestSchema = z.object(
  {
    symbol: z.string({
      required_error: "'symbol' field is required",
      invalid_type_error: "'symbol' must be a string",
    }),
    start_date: z.unknown().refine((v) => v !== undefined, "'start_date' field is required"),
    end_date: z.unknown().refine((v) => v !== undefined, "'end_date' field is required"),
    interval: z.unknown().optional(),
    include_bars: z.boolean({ invalid_type_error: "'include_bars' must be a boolean if provided" }).optional(),
  },
  {
    required_error: "JSON body must be an object",
    invalid_type_error: "JSON body must be an object",
  },
);

/** Trim and upper-case a symbol; throws InvalidSymbol if it cannot name a ticker. */
export function normalizeSymbol(raw: string): string {
  const symbol = raw.trim().toUpperCase();
  if (!symbol) {
    throw new HistoryError("InvalidSymbol", "'symbol' cannot be empty");
  }
  if (!SYMBOL_RE.test(symbol)) {
    throw new HistoryError("InvalidSymbol", `Invalid symbol '${raw}': must be 1-20 alphanumeric characters`);
  }
  return symbol;
}

/**
 * Validate a historical-data or analytical-insights request body.
 * Runs entirely before any upstream call.
 */
export function parseHistoricalRequest(body: unknown): HistoricalQuery {
  const parsed = historicalRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new HistoryError("InvalidRequest", parsed.error.issues[0]?.message ?? "Invalid request body");
  }
  const { symbol, start_date, end_date, interval, include_bars } = parsed.data;
  return {
    symbol: normalizeSymbol(symbol),
    range: validateRange(start_date, end_date, interval),
    includeBars: include_bars ?? true,
  };
}
