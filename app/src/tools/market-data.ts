import type { Fundamentals, Interval, NewsItem, PriceBar } from "@investment-desk/shared";

// ============================================
// Market Data Source Contract
// ============================================

/**
 * Supplier of raw market data. Where partial results make sense (no news,
 * unknown metrics) implementations return empty values rather than throw.
 */
export interface MarketDataSource {
  getPriceHistory(symbol: string, start: Date, end: Date, interval: Interval): Promise<PriceBar[]>;
  getFundamentals(symbol: string): Promise<Fundamentals>;
  getRecentNews(symbol: string, limit: number): Promise<NewsItem[]>;
}

export interface StaticMarketData {
  prices?: Record<string, PriceBar[]>;
  fundamentals?: Record<string, Fundamentals>;
  news?: Record<string, NewsItem[]>;
}

// ============================================
// In-memory Source
// ============================================

/**
 * Serves fixed data keyed by upper-case symbol. Price history is filtered to
 * the requested date range; the interval is taken as given.
 */
export class StaticMarketDataSource implements MarketDataSource {
  private prices: Map<string, PriceBar[]>;
  private fundamentals: Map<string, Fundamentals>;
  private news: Map<string, NewsItem[]>;

  constructor(data: StaticMarketData = {}) {
    this.prices = toMap(data.prices);
    this.fundamentals = toMap(data.fundamentals);
    this.news = toMap(data.news);
  }

  async getPriceHistory(symbol: string, start: Date, end: Date): Promise<PriceBar[]> {
    const bars = this.prices.get(symbol.toUpperCase()) || [];
    return bars
      .filter((b) => b.timestamp >= start && b.timestamp <= end)
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }

  async getFundamentals(symbol: string): Promise<Fundamentals> {
    return { ...(this.fundamentals.get(symbol.toUpperCase()) || {}) };
  }

  async getRecentNews(symbol: string, limit: number): Promise<NewsItem[]> {
    return (this.news.get(symbol.toUpperCase()) || []).slice(0, limit);
  }
}

function toMap<T>(record: Record<string, T> | undefined): Map<string, T> {
  const map = new Map<string, T>();
  for (const [key, value] of Object.entries(record || {})) {
    map.set(key.toUpperCase(), value);
  }
  return map;
}
