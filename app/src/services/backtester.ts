/**
 * Backtesting Service
 *
 * Replays a decision's implied position weight over the price history it
 * was made from:
 * - Weighted equity curve (the rest of capital sits in cash at zero return)
 * - Total and annualized return
 * - Sharpe ratio and maximum drawdown
 */

import { EventEmitter } from "events";
import type { BacktestReport, Decision, Interval, PriceBar } from "@investment-desk/shared";
import { isFiniteNumber, mean, standardDeviation, toDateString } from "../utils/math";

// ============================================
// Types
// ============================================

export interface BacktestOptions {
  /** Explicit annualization factor; wins over `interval` */
  periodsPerYear?: number;
  /** Bar interval of the series, used to pick the annualization factor */
  interval?: Interval;
}

export interface BacktestCurve {
  returns: number[];
  /** Cumulative growth of one unit fully invested in the asset */
  benchmark: number[];
  /** Cumulative growth of one unit at the decision's weight */
  portfolio: number[];
}

export const PERIODS_PER_YEAR: Record<Interval, number> = {
  "1d": 252,
  "1wk": 52,
  "1mo": 12,
};

// Lower bound on the weight used to scale volatility in the Sharpe ratio
export const MIN_WEIGHT = 1e-9;

// ============================================
// Backtester Class
// ============================================

export class Backtester extends EventEmitter {
  private defaults: BacktestOptions;

  constructor(defaults: BacktestOptions = {}) {
    super();
    this.defaults = defaults;
  }

  /**
   * Evaluate a decision against the bars it was made from
   */
  backtest(decision: Decision, bars: readonly PriceBar[], options: BacktestOptions = {}): BacktestReport {
    const weight = this.effectiveWeight(decision);
    const periodsPerYear = this.periodsPerYear({ ...this.defaults, ...options });
    const curve = this.buildCurve(bars, weight);

    const last = curve.portfolio.length - 1;
    const totalReturn = last >= 0 ? curve.portfolio[last] - 1 : 0;
    const benchmarkReturn = last >= 0 ? curve.benchmark[last] - 1 : 0;

    const annualizedReturn = mean(curve.returns) * periodsPerYear * weight;

    // Sharpe ratio (0% risk-free rate)
    const denominator =
      standardDeviation(curve.returns, 1) * Math.sqrt(periodsPerYear) * Math.max(weight, MIN_WEIGHT);
    const sharpe = denominator > 0 ? annualizedReturn / denominator : 0;

    const report: BacktestReport = {
      start_date: bars.length > 0 ? toDateString(bars[0].timestamp) : null,
      end_date: bars.length > 0 ? toDateString(bars[bars.length - 1].timestamp) : null,
      total_return: finiteOrZero(totalReturn),
      annualized_return: finiteOrZero(annualizedReturn),
      sharpe_ratio: finiteOrZero(sharpe),
      max_drawdown: finiteOrZero(this.maxDrawdown(curve.portfolio)),
      cumulative_returns: {
        portfolio: finiteOrZero(totalReturn),
        benchmark: finiteOrZero(benchmarkReturn),
      },
    };

    this.emit("backtestComplete", { symbol: decision.symbol, weight, report });
    return report;
  }

  /**
   * Sum of buy-order weights for the decision's symbol
   */
  effectiveWeight(decision: Decision): number {
    return decision.orders
      .filter((o) => o.action === "buy" && o.symbol === decision.symbol)
      .reduce((sum, o) => sum + (isFiniteNumber(o.weight) ? o.weight : 0), 0);
  }

  buildCurve(bars: readonly PriceBar[], weight: number): BacktestCurve {
    const returns: number[] = [];
    const benchmark: number[] = [];
    const portfolio: number[] = [];

    let growth = 1;
    for (let i = 0; i < bars.length; i++) {
      // First bar has no prior close
      const r = i === 0 ? 0 : bars[i].close / bars[i - 1].close - 1;
      const dailyReturn = Number.isFinite(r) ? r : 0;

      growth *= 1 + dailyReturn;
      returns.push(dailyReturn);
      benchmark.push(growth);
      portfolio.push(1 + weight * (growth - 1));
    }

    return { returns, benchmark, portfolio };
  }

  private periodsPerYear(options: BacktestOptions): number {
    if (isFiniteNumber(options.periodsPerYear) && options.periodsPerYear > 0) {
      return options.periodsPerYear;
    }
    return options.interval ? PERIODS_PER_YEAR[options.interval] : PERIODS_PER_YEAR["1d"];
  }

  private maxDrawdown(curve: readonly number[]): number {
    let peak = -Infinity;
    let maxDrawdown = 0;

    for (const value of curve) {
      if (value > peak) peak = value;
      if (peak > 0) {
        const drawdown = (value - peak) / peak;
        if (drawdown < maxDrawdown) maxDrawdown = drawdown;
      }
    }

    return maxDrawdown;
  }
}

// Also folds -0 into 0
function finiteOrZero(value: number): number {
  return Number.isFinite(value) && value !== 0 ? value : 0;
}

export function createBacktester(defaults: BacktestOptions = {}): Backtester {
  return new Backtester(defaults);
}
