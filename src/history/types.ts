export const INTERVALS = ["daily", "weekly", "monthly", "quarterly"] as const;

export type Interval = (typeof INTERVALS)[number];

/** A validated, inclusive window of calendar dates (YYYY-MM-DD) */
export interface DateRange {
  start: string;
  end: string;
  interval: Interval;
}

export interface Bar {
  /** Bar open instant, ISO-8601 */
  timestamp: string;
  /** Calendar date of the bar in UTC (YYYY-MM-DD) */
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  /** Split/dividend-adjusted close when the upstream supplies one */
  adjClose: number | null;
  volume: number;
}

/** Bars for one symbol over one range, ascending by timestamp. May be empty. */
export interface PriceSeries {
  symbol: string;
  range: DateRange;
  bars: Bar[];
}

export interface Analytics {
  barCount: number;
  averageClose: number;
  maxClose: number;
  minClose: number;
  /** Date of the first bar closing at maxClose */
  maxCloseDate: string;
  /** Date of the first bar closing at minClose */
  minCloseDate: string;
  /** Population standard deviation of closes */
  volatility: number;
  /** (last close - first close) / first close, as a ratio */
  totalReturn: number;
  firstDate: string;
  lastDate: string;
}

export interface HistoricalQuery {
  symbol: string;
  range: DateRange;
  includeBars: boolean;
}

export interface CompanyOfficer {
  name: string | null;
  title: string | null;
  age: number | null;
  yearBorn: number | null;
}

export interface CompanyProfile {
  symbol: string;
  name: string | null;
  summary: string | null;
  industry: string | null;
  sector: string | null;
  website: string | null;
  officers: CompanyOfficer[];
}

export interface MarketSnapshot {
  symbol: string;
  currency: string | null;
  lastPrice: number | null;
  previousClose: number | null;
  open: number | null;
  dayHigh: number | null;
  dayLow: number | null;
  volume: number | null;
  marketCap: number | null;
  fiftyTwoWeekHigh: number | null;
  fiftyTwoWeekLow: number | null;
}
