export type HistoryErrorKind =
  | "InvalidRequest"
  | "InvalidSymbol"
  | "InvalidDateFormat"
  | "InvalidDateRange"
  | "InvalidInterval"
  | "SymbolNotFound"
  | "UpstreamUnavailable"
  | "EmptySeries";

/**
 * Every failure the history pipeline surfaces. `kind` is machine-readable;
 * `message` is meant for the caller.
 */
export class HistoryError extends Error {
  readonly kind: HistoryErrorKind;

  constructor(kind: HistoryErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HistoryError";
    this.kind = kind;
  }
}

export function isHistoryError(e: unknown): e is HistoryError {
  return e instanceof HistoryError;
}

const STATUS_BY_KIND: Record<HistoryErrorKind, number> = {
  InvalidRequest: 400,
  InvalidSymbol: 400,
  InvalidDateFormat: 400,
  InvalidDateRange: 400,
  InvalidInterval: 400,
  SymbolNotFound: 404,
  EmptySeries: 422,
  UpstreamUnavailable: 502,
};

export function httpStatusFor(kind: HistoryErrorKind): number {
  return STATUS_BY_KIND[kind];
}
