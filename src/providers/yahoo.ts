import type YahooFinance from "yahoo-finance2";
import { HistoryError } from "../history/errors.js";
import type { MarketDataProvider } from "../history/provider.js";
import { addDays } from "../history/range.js";
import type {
  Bar,
  CompanyProfile,
  DateRange,
  Interval,
  MarketSnapshot,
  PriceSeries,
} from "../history/types.js";
import { logProvider } from "../logging.js";
import { withRetry, withTimeout } from "./retry.js";

export type YahooClient = InstanceType<typeof YahooFinance>;

export interface YahooProviderOptions {
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

const YAHOO_INTERVALS: Record<Interval, "1d" | "1wk" | "1mo" | "3mo"> = {
  daily: "1d",
  weekly: "1wk",
  monthly: "1mo",
  quarterly: "3mo",
};

// Yahoo phrases an unknown or delisted ticker a few different ways
const NOT_FOUND_RE = /not found|no data found|delisted/i;

/** One row of a chart() response; any price field may be null on holidays or halts */
export interface ChartRow {
  date: Date;
  open?: number | null;
  high?: number | null;
  low?: number | null;
  close?: number | null;
  adjclose?: number | null;
  volume?: number | null;
}

/**
 * Turn raw chart rows into an ordered bar list: rows missing any OHLC value
 * are dropped, rows are sorted by time, a repeated timestamp keeps its first row.
 * `date` is the exchange-local calendar day, shifted by `gmtOffsetSeconds`
 * (the chart meta's `gmtoffset`); `timestamp` stays in UTC.
 */
export function normalizeChartRows(rows: ChartRow[], gmtOffsetSeconds = 0): Bar[] {
  const bars: Bar[] = [];
  for (const row of rows) {
    const { open, high, low, close } = row;
    if (open == null || high == null || low == null || close == null) continue;
    bars.push({
      timestamp: row.date.toISOString(),
      date: new Date(row.date.getTime() + gmtOffsetSeconds * 1000).toISOString().slice(0, 10),
      open,
      high,
      low,
      close,
      adjClose: row.adjclose ?? null,
      volume: Math.max(0, Math.round(row.volume ?? 0)),
    });
  }
  bars.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  return bars.filter((bar, i) => i === 0 || bar.timestamp !== bars[i - 1].timestamp);
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Market data over Yahoo Finance. Owns nothing but the injected client;
 * construct once at startup and share across requests.
 */
export class YahooProvider implements MarketDataProvider {
  constructor(
    private readonly yf: YahooClient,
    private readonly opts: YahooProviderOptions,
  ) {}

  /**
   * Daily windows are padded a day either side, since period1/period2 are UTC
   * instants, then trimmed to the exchange-local dates asked for.
   * Weekly, monthly and quarterly bars are stamped with the first day of their
   * period, so the first bar may carry a date before `range.start`.
   */
  async getSeries(symbol: string, range: DateRange): Promise<PriceSeries> {
    const daily = range.interval === "daily";
    const chart = await this.call(symbol, "chart", () =>
      this.yf.chart(symbol, {
        period1: daily ? addDays(range.start, -1) : range.start,
        // period2 is exclusive upstream — add a day so the end date is included
        period2: addDays(range.end, daily ? 2 : 1),
        interval: YAHOO_INTERVALS[range.interval],
        return: "array",
      }),
    );
    const bars = normalizeChartRows(chart.quotes ?? [], chart.meta.gmtoffset ?? 0);
    return {
      symbol,
      range,
      bars: daily ? bars.filter((bar) => bar.date >= range.start && bar.date <= range.end) : bars,
    };
  }

  async getCompanyProfile(symbol: string): Promise<CompanyProfile> {
    const summary = await this.call(symbol, "quoteSummary", () =>
      this.yf.quoteSummary(symbol, { modules: ["assetProfile", "price"] }),
    );
    const profile = summary.assetProfile;
    const price = summary.price;
    if (!profile && !price) {
      throw new HistoryError("SymbolNotFound", `No company information found for symbol '${symbol}'`);
    }

    return {
      symbol,
      name: price?.longName ?? price?.shortName ?? null,
      summary: profile?.longBusinessSummary ?? null,
      industry: profile?.industry ?? null,
      sector: profile?.sector ?? null,
      website: profile?.website ?? null,
      officers: (profile?.companyOfficers ?? []).map((o) => ({
        name: o.name ?? null,
        title: o.title ?? null,
        age: o.age ?? null,
        yearBorn: o.yearBorn ?? null,
      })),
    };
  }

  async getMarketSnapshot(symbol: string): Promise<MarketSnapshot> {
    const q = await this.call(symbol, "quote", () => this.yf.quote(symbol));
    if (!q) {
      throw new HistoryError("SymbolNotFound", `No market data found for symbol '${symbol}'`);
    }
    return {
      symbol,
      currency: q.currency ?? null,
      lastPrice: q.regularMarketPrice ?? null,
      previousClose: q.regularMarketPreviousClose ?? null,
      open: q.regularMarketOpen ?? null,
      dayHigh: q.regularMarketDayHigh ?? null,
      dayLow: q.regularMarketDayLow ?? null,
      volume: q.regularMarketVolume ?? null,
      marketCap: q.marketCap ?? null,
      fiftyTwoWeekHigh: q.fiftyTwoWeekHigh ?? null,
      fiftyTwoWeekLow: q.fiftyTwoWeekLow ?? null,
    };
  }

  /** Timeout + retry around one upstream call, with failures mapped to HistoryError kinds. */
  private async call<T>(symbol: string, method: string, fn: () => Promise<T>): Promise<T> {
    const label = `Yahoo ${method}(${symbol})`;
    try {
      return await withRetry(() => withTimeout(fn(), this.opts.timeoutMs, label), {
        retries: this.opts.maxRetries,
        delayMs: this.opts.retryDelayMs,
        label,
        shouldRetry: (err) => !NOT_FOUND_RE.test(err.message),
      });
    } catch (e: unknown) {
      const message = errorMessage(e);
      if (NOT_FOUND_RE.test(message)) {
        logProvider.info({ symbol, method }, "Symbol not found upstream");
        throw new HistoryError("SymbolNotFound", `No data found for symbol '${symbol}'`, { cause: e });
      }
      logProvider.error({ symbol, method, err: message }, "Upstream call failed");
      throw new HistoryError("UpstreamUnavailable", "Failed to retrieve data from upstream provider", { cause: e });
    }
  }
}
