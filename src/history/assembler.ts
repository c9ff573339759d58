import type { Analytics, Bar, CompanyProfile, MarketSnapshot, PriceSeries } from "./types.js";

// ── Response shapes (wire format is snake_case) ─────────────────────────────

export interface BarResponse {
  date: string;
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  adj_close: number | null;
  volume: number;
}

export interface HistoryResponse {
  symbol: string;
  interval: string;
  start_date: string;
  end_date: string;
  count: number;
  bars: BarResponse[];
}

export interface InsightsResponse {
  symbol: string;
  interval: string;
  start_date: string;
  end_date: string;
  bar_count: number;
  average_close: number;
  max_close: number;
  min_close: number;
  max_close_date: string;
  min_close_date: string;
  volatility: number;
  total_return: number;
  first_date: string;
  last_date: string;
  bars?: BarResponse[];
}

export interface CompanyInfoResponse {
  symbol: string;
  name: string | null;
  summary: string | null;
  industry: string | null;
  sector: string | null;
  website: string | null;
  officers: Array<{ name: string | null; title: string | null; age: number | null; year_born: number | null }>;
}

export interface MarketDataResponse {
  symbol: string;
  currency: string | null;
  last_price: number | null;
  previous_close: number | null;
  open: number | null;
  day_high: number | null;
  day_low: number | null;
  volume: number | null;
  market_cap: number | null;
  fifty_two_week_high: number | null;
  fifty_two_week_low: number | null;
}

// ── Assemblers ──────────────────────────────────────────────────────────────

function formatBar(bar: Bar): BarResponse {
  return {
    date: bar.date,
    timestamp: bar.timestamp,
    open: bar.open,
    high: bar.high,
    low: bar.low,
    close: bar.close,
    adj_close: bar.adjClose,
    volume: bar.volume,
  };
}

export function assembleHistory(series: PriceSeries): HistoryResponse {
  return {
    symbol: series.symbol,
    interval: series.range.interval,
    start_date: series.range.start,
    end_date: series.range.end,
    count: series.bars.length,
    bars: series.bars.map(formatBar),
  };
}

export function assembleInsights(
  series: PriceSeries,
  analytics: Analytics,
  includeBars: boolean,
): InsightsResponse {
  const response: InsightsResponse = {
    symbol: series.symbol,
    interval: series.range.interval,
    start_date: series.range.start,
    end_date: series.range.end,
    bar_count: analytics.barCount,
    average_close: analytics.averageClose,
    max_close: analytics.maxClose,
    min_close: analytics.minClose,
    max_close_date: analytics.maxCloseDate,
    min_close_date: analytics.minCloseDate,
    volatility: analytics.volatility,
    total_return: analytics.totalReturn,
    first_date: analytics.firstDate,
    last_date: analytics.lastDate,
  };
  if (includeBars) response.bars = series.bars.map(formatBar);
  return response;
}

export function assembleCompanyProfile(profile: CompanyProfile): CompanyInfoResponse {
  return {
    symbol: profile.symbol,
    name: profile.name,
    summary: profile.summary,
    industry: profile.industry,
    sector: profile.sector,
    website: profile.website,
    officers: profile.officers.map((o) => ({
      name: o.name,
      title: o.title,
      age: o.age,
      year_born: o.yearBorn,
    })),
  };
}

export function assembleMarketSnapshot(snapshot: MarketSnapshot): MarketDataResponse {
  return {
    symbol: snapshot.symbol,
    currency: snapshot.currency,
    last_price: snapshot.lastPrice,
    previous_close: snapshot.previousClose,
    open: snapshot.open,
    day_high: snapshot.dayHigh,
    day_low: snapshot.dayLow,
    volume: snapshot.volume,
    market_cap: snapshot.marketCap,
    fifty_two_week_high: snapshot.fiftyTwoWeekHigh,
    fifty_two_week_low: snapshot.fiftyTwoWeekLow,
  };
}
