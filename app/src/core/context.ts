import type { Fundamentals, Interval, NewsItem, PriceBar } from "@investment-desk/shared";
import type { IndicatorTable } from "../tools/technical";

// ============================================
// Analysis Context
// ============================================

/**
 * Everything a scoring agent may look at for one symbol. Built once per
 * symbol and frozen; agents never see each other's reports.
 */
export interface AnalysisContext {
  readonly symbol: string;
  readonly priceHistory: readonly PriceBar[];
  readonly indicators: IndicatorTable;
  readonly fundamentals: Readonly<Fundamentals>;
  readonly news: readonly NewsItem[];
  readonly interval: Interval;
}

export function createAnalysisContext(input: {
  symbol: string;
  priceHistory: readonly PriceBar[];
  indicators: IndicatorTable;
  fundamentals?: Fundamentals | null;
  news?: readonly NewsItem[] | null;
  interval?: Interval;
}): AnalysisContext {
  return Object.freeze({
    symbol: input.symbol.toUpperCase(),
    priceHistory: Object.freeze([...input.priceHistory]),
    indicators: input.indicators,
    fundamentals: Object.freeze({ ...(input.fundamentals ?? {}) }),
    news: Object.freeze([...(input.news ?? [])]),
    interval: input.interval ?? "1d",
  });
}
