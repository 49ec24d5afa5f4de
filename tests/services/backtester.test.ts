/**
 * Tests for Backtesting Service
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Decision, Order, PriceBar } from "@investment-desk/shared";
import { Backtester, createBacktester } from "../../app/src/services/backtester";

// ============================================
// Test Data Helpers
// ============================================

function makeBars(closes: number[]): PriceBar[] {
  return closes.map((close, i) => ({
    timestamp: new Date(Date.UTC(2024, 0, 1 + i)),
    open: close,
    high: close,
    low: close,
    close,
    volume: 1_000_000,
  }));
}

function makeOrder(weight: number, overrides: Partial<Order> = {}): Order {
  return {
    symbol: "TEST",
    action: "buy",
    weight,
    entry_rule: "SMA20>SMA50 & MACD histogram positive",
    stop: 0.08,
    take_profit: 0.2,
    rationale: "",
    ...overrides,
  };
}

function makeDecision(orders: Order[]): Decision {
  return {
    as_of_date: "2024-01-03",
    symbol: "TEST",
    composite_score: 0.5,
    orders,
    max_gross_exposure: 1,
    notes: "",
    agent_reports: [],
  };
}

// ============================================
// Backtester
// ============================================

describe("Backtester", () => {
  let backtester: Backtester;

  beforeEach(() => {
    backtester = createBacktester();
  });

  describe("effectiveWeight", () => {
    it("should sum buy orders for the decision's symbol", () => {
      const decision = makeDecision([
        makeOrder(0.1),
        makeOrder(0.05),
        makeOrder(0.3, { action: "hold" }),
        makeOrder(0.4, { symbol: "OTHER" }),
      ]);

      expect(backtester.effectiveWeight(decision)).toBeCloseTo(0.15, 12);
    });

    it("should be zero without orders", () => {
      expect(backtester.effectiveWeight(makeDecision([]))).toBe(0);
    });
  });

  describe("buildCurve", () => {
    it("should start with a zero return and scale the benchmark by weight", () => {
      const curve = backtester.buildCurve(makeBars([100, 110, 99]), 0.5);

      expect(curve.returns[0]).toBe(0);
      expect(curve.returns[1]).toBeCloseTo(0.1, 12);
      expect(curve.returns[2]).toBeCloseTo(-0.1, 12);
      expect(curve.benchmark[2]).toBeCloseTo(0.99, 12);
      expect(curve.portfolio[1]).toBeCloseTo(1.05, 12);
      expect(curve.portfolio[2]).toBeCloseTo(0.995, 12);
    });
  });

  describe("backtest", () => {
    it("should stay flat with no position", () => {
      const report = backtester.backtest(makeDecision([]), makeBars([100, 90, 110]));

      expect(report.total_return).toBe(0);
      expect(report.annualized_return).toBe(0);
      expect(report.sharpe_ratio).toBe(0);
      expect(report.max_drawdown).toBe(0);
      expect(report.cumulative_returns.portfolio).toBe(0);
      expect(report.cumulative_returns.benchmark).toBeCloseTo(0.1, 12);
    });

    it("should compute return and risk metrics for a full position", () => {
      const report = backtester.backtest(makeDecision([makeOrder(1)]), makeBars([100, 110, 121]));

      expect(report.start_date).toBe("2024-01-01");
      expect(report.end_date).toBe("2024-01-03");
      expect(report.total_return).toBeCloseTo(0.21, 12);
      expect(report.annualized_return).toBeCloseTo(16.8, 10);
      expect(report.sharpe_ratio).toBeCloseTo(18.33030277982336, 8);
      expect(report.max_drawdown).toBe(0);
      expect(report.cumulative_returns.benchmark).toBeCloseTo(0.21, 12);
    });

    it("should measure drawdown on the weighted curve", () => {
      const report = backtester.backtest(makeDecision([makeOrder(0.5)]), makeBars([100, 110, 99]));

      expect(report.total_return).toBeCloseTo(-0.005, 12);
      expect(report.max_drawdown).toBeCloseTo(-0.052380952380952424, 12);
      expect(report.cumulative_returns.portfolio).toBeCloseTo(-0.005, 12);
      expect(report.cumulative_returns.benchmark).toBeCloseTo(-0.01, 12);
    });

    it("should annualize weekly bars with 52 periods", () => {
      const report = backtester.backtest(makeDecision([makeOrder(1)]), makeBars([100, 110, 121]), {
        interval: "1wk",
      });

      expect(report.annualized_return).toBeCloseTo(3.4666666666666694, 10);
      expect(report.sharpe_ratio).toBeCloseTo(8.32666399786453, 8);
    });

    it("should prefer an explicit annualization factor", () => {
      const weekly = createBacktester({ interval: "1wk" });
      const report = weekly.backtest(makeDecision([makeOrder(1)]), makeBars([100, 110, 121]), {
        periodsPerYear: 12,
      });

      // mean return 0.1 * 2 / 3 over twelve periods
      expect(report.annualized_return).toBeCloseTo(0.8, 10);
    });

    it("should return zeros and no dates for an empty series", () => {
      const report = backtester.backtest(makeDecision([makeOrder(0.2)]), []);

      expect(report).toEqual({
        start_date: null,
        end_date: null,
        total_return: 0,
        annualized_return: 0,
        sharpe_ratio: 0,
        max_drawdown: 0,
        cumulative_returns: { portfolio: 0, benchmark: 0 },
      });
    });

    it("should guard the Sharpe ratio against zero volatility", () => {
      const report = backtester.backtest(makeDecision([makeOrder(1)]), makeBars([100, 100, 100]));

      expect(report.sharpe_ratio).toBe(0);
      expect(report.total_return).toBe(0);
    });

    it("should emit backtestComplete", () => {
      const listener = vi.fn();
      backtester.on("backtestComplete", listener);

      const report = backtester.backtest(makeDecision([makeOrder(0.5)]), makeBars([100, 110]));

      expect(listener).toHaveBeenCalledWith({ symbol: "TEST", weight: 0.5, report });
    });
  });
});
