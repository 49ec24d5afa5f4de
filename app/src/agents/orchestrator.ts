import {
  PriceBarSchema,
  type AgentReport,
  type DecisionWithBacktest,
  type Fundamentals,
  type Interval,
  type MeetingResult,
  type NewsItem,
  type PriceBar,
  type SymbolFailure,
} from "@investment-desk/shared";
import { z } from "zod";
import type { ScoringAgent } from "./base";
import { TechnicalAnalyst, FundamentalAnalyst, SentimentAnalyst } from "./analysis";
import { PortfolioManager, RiskOfficer } from "./decision";
import { createAnalysisContext, type AnalysisContext } from "../core/context";
import { DEFAULT_DESK_CONFIG, type DeskConfig } from "../core/config";
import { DataRetrievalError, toError } from "../core/errors";
import { Backtester } from "../services/backtester";
import { IndicatorEngine } from "../tools/technical";
import type { MarketDataSource } from "../tools/market-data";

// ============================================
// Meeting Orchestrator
// ============================================

export interface MeetingOrchestratorOptions {
  dataSource: MarketDataSource;
  agents: ScoringAgent[];
  portfolioManager: PortfolioManager;
  backtester?: Backtester;
  indicatorEngine?: IndicatorEngine;
  interval?: Interval;
  newsLimit?: number;
}

const PriceHistorySchema = z.array(PriceBarSchema);

/**
 * Runs the investment meeting: for each symbol, fetch data, let every
 * scoring agent report, synthesize a decision and backtest it. A failure
 * for one symbol is recorded in the result and never stops the others.
 */
export class MeetingOrchestrator {
  readonly name = "Meeting Orchestrator";
  private dataSource: MarketDataSource;
  private agents: readonly ScoringAgent[];
  private portfolioManager: PortfolioManager;
  private backtester: Backtester;
  private indicatorEngine: IndicatorEngine;
  private interval: Interval;
  private newsLimit: number;

  constructor(options: MeetingOrchestratorOptions) {
    this.dataSource = options.dataSource;
    this.agents = [...options.agents];
    this.portfolioManager = options.portfolioManager;
    this.backtester = options.backtester || new Backtester();
    this.indicatorEngine = options.indicatorEngine || new IndicatorEngine();
    this.interval = options.interval || DEFAULT_DESK_CONFIG.interval;
    this.newsLimit = options.newsLimit || DEFAULT_DESK_CONFIG.newsLimit;
  }

  async runMeeting(symbols: readonly string[], start: Date, end: Date): Promise<MeetingResult> {
    const unique = [...new Set(symbols.map((s) => s.trim().toUpperCase()).filter((s) => s.length > 0))];
    this.log(`Starting meeting for ${unique.length} symbols`, {
      symbols: unique,
      start: start.toISOString(),
      end: end.toISOString(),
    });
    const startTime = Date.now();

    const results = await Promise.allSettled(unique.map((symbol) => this.runSymbol(symbol, start, end)));

    const outcome: MeetingResult = {};
    results.forEach((result, index) => {
      const symbol = unique[index];
      if (result.status === "fulfilled") {
        outcome[symbol] = result.value;
      } else {
        const error = toError(result.reason);
        this.logError(`${symbol} failed`, error.message);
        outcome[symbol] = this.failure(symbol, error);
      }
    });

    const failed = Object.values(outcome).filter((o) => "error" in o).length;
    this.log(
      `Meeting complete: ${unique.length - failed} succeeded, ${failed} failed in ${Date.now() - startTime}ms`,
    );
    return outcome;
  }

  /**
   * Score, synthesize and backtest one symbol from an already-built context
   */
  evaluate(context: AnalysisContext): DecisionWithBacktest {
    const reports: AgentReport[] = this.agents.map((agent) => agent.analyze(context));
    const decision = this.portfolioManager.synthesize(reports, context);
    const backtest = this.backtester.backtest(decision, context.priceHistory, {
      interval: context.interval,
    });

    return { ...decision, backtest };
  }

  private async runSymbol(symbol: string, start: Date, end: Date): Promise<DecisionWithBacktest> {
    const [priceHistory, fundamentals, news] = await Promise.all([
      this.fetchPriceHistory(symbol, start, end),
      this.fetchOrDefault<Fundamentals>(
        "fundamentals",
        symbol,
        () => this.dataSource.getFundamentals(symbol),
        {},
      ),
      this.fetchOrDefault<NewsItem[]>(
        "news",
        symbol,
        () => this.dataSource.getRecentNews(symbol, this.newsLimit),
        [],
      ),
    ]);

    const context = createAnalysisContext({
      symbol,
      priceHistory,
      indicators: this.indicatorEngine.compute(priceHistory),
      fundamentals,
      news,
      interval: this.interval,
    });

    const result = this.evaluate(context);
    this.log(`${symbol}: composite ${result.composite_score.toFixed(3)}, ${result.orders.length} orders`);
    return result;
  }

  private async fetch<T>(what: string, symbol: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      const cause = toError(error);
      throw new DataRetrievalError(`Failed to fetch ${what} for ${symbol}: ${cause.message}`, {
        symbol,
        originalError: cause,
      });
    }
  }

  /**
   * Fundamentals and news are optional inputs: a failed call is logged and
   * the agents see an empty value instead.
   */
  private async fetchOrDefault<T>(
    what: string,
    symbol: string,
    call: () => Promise<T>,
    fallback: T,
  ): Promise<T> {
    try {
      return await this.fetch(what, symbol, call);
    } catch (error) {
      this.logError(`Continuing ${symbol} without ${what}`, toError(error).message);
      return fallback;
    }
  }

  private async fetchPriceHistory(symbol: string, start: Date, end: Date): Promise<PriceBar[]> {
    const raw: unknown = await this.fetch("price history", symbol, () =>
      this.dataSource.getPriceHistory(symbol, start, end, this.interval),
    );

    const parsed = PriceHistorySchema.safeParse(raw);
    if (!parsed.success) {
      throw new DataRetrievalError(`Malformed price history for ${symbol}: ${parsed.error.issues[0].message}`, {
        symbol,
      });
    }
    if (parsed.data.length === 0) {
      throw new DataRetrievalError(`No price history for ${symbol}`, { symbol });
    }

    const bars = parsed.data;
    for (let i = 1; i < bars.length; i++) {
      if (bars[i].timestamp.getTime() <= bars[i - 1].timestamp.getTime()) {
        throw new DataRetrievalError(`Price history for ${symbol} is not strictly increasing in time`, {
          symbol,
        });
      }
    }
    return bars;
  }

  private failure(symbol: string, error: Error): SymbolFailure {
    return { symbol, error: { name: error.name, message: error.message } };
  }

  private log(message: string, data?: Record<string, unknown>): void {
    console.log(`[${this.name}] ${message}`, data || "");
  }

  private logError(message: string, error?: unknown): void {
    console.error(`[${this.name}] ${message}`, error || "");
  }
}

// ============================================
// Factories
// ============================================

/**
 * A fresh set of the four scoring agents, configured from the desk config
 */
export function createScoringAgents(config: DeskConfig = DEFAULT_DESK_CONFIG): ScoringAgent[] {
  return [
    new TechnicalAnalyst(),
    new FundamentalAnalyst(),
    new SentimentAnalyst(),
    new RiskOfficer({
      config: {
        maxWeightPerAsset: config.maxWeightPerAsset,
        maxSectorExposure: config.maxSectorExposure,
        targetVolatility: config.targetVolatility,
      },
    }),
  ];
}

export function createMeetingOrchestrator(
  dataSource: MarketDataSource,
  config: DeskConfig = DEFAULT_DESK_CONFIG,
): MeetingOrchestrator {
  return new MeetingOrchestrator({
    dataSource,
    agents: createScoringAgents(config),
    portfolioManager: new PortfolioManager({
      minConfidence: config.minConfidence,
      maxGrossExposure: config.maxGrossExposure,
      defaultMaxWeight: config.maxWeightPerAsset,
    }),
    interval: config.interval,
    newsLimit: config.newsLimit,
  });
}
