import { computeAnalytics } from "./analytics.js";
import {
  assembleCompanyProfile,
  assembleHistory,
  assembleInsights,
  assembleMarketSnapshot,
  type CompanyInfoResponse,
  type HistoryResponse,
  type InsightsResponse,
  type MarketDataResponse,
} from "./assembler.js";
import type { MarketDataProvider } from "./provider.js";
import { normalizeSymbol } from "./request.js";
import type { HistoricalQuery } from "./types.js";
import { logHistory } from "../logging.js";

/**
 * Request pipeline: validated query → provider → analytics → response.
 * Holds no per-request state; one instance serves every request.
 */
export class HistoryService {
  constructor(private readonly provider: MarketDataProvider) {}

  async getHistory(query: HistoricalQuery): Promise<HistoryResponse> {
    const series = await this.provider.getSeries(query.symbol, query.range);
    logHistory.debug({ symbol: query.symbol, range: query.range, bars: series.bars.length }, "Series fetched");
    return assembleHistory(series);
  }

  async getInsights(query: HistoricalQuery): Promise<InsightsResponse> {
    const series = await this.provider.getSeries(query.symbol, query.range);
    const analytics = computeAnalytics(series);
    logHistory.debug({ symbol: query.symbol, range: query.range, bars: analytics.barCount }, "Analytics computed");
    return assembleInsights(series, analytics, query.includeBars);
  }

  async getCompanyInfo(rawSymbol: string): Promise<CompanyInfoResponse> {
    const symbol = normalizeSymbol(rawSymbol);
    return assembleCompanyProfile(await this.provider.getCompanyProfile(symbol));
  }

  async getMarketData(rawSymbol: string): Promise<MarketDataResponse> {
    const symbol = normalizeSymbol(rawSymbol);
    return assembleMarketSnapshot(await this.provider.getMarketSnapshot(symbol));
  }
}
