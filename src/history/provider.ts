import type { CompanyProfile, DateRange, MarketSnapshot, PriceSeries } from "./types.js";

/**
 * Source of price history. Implementations bound every call by a timeout and
 * reject with a HistoryError of kind UpstreamUnavailable or SymbolNotFound.
 * An empty `bars` array means the range held no trading activity.
 */
export interface SeriesProvider {
  getSeries(symbol: string, range: DateRange): Promise<PriceSeries>;
}

/** A SeriesProvider that also serves company profile and quote snapshot fields. */
export interface MarketDataProvider extends SeriesProvider {
  getCompanyProfile(symbol: string): Promise<CompanyProfile>;
  getMarketSnapshot(symbol: string): Promise<MarketSnapshot>;
}
