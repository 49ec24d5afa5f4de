import { describe, it, expect } from "vitest";
import type { MeetingResult, PriceBar } from "@investment-desk/shared";
import {
  serializeDecision,
  parseDecision,
  parseDecisionWithBacktest,
  parseMeetingResult,
} from "../../app/src/core/serialization";
import { InvalidInputError } from "../../app/src/core/errors";
import { createAnalysisContext } from "../../app/src/core/context";
import { computeIndicators } from "../../app/src/tools/technical";
import { createScoringAgents, MeetingOrchestrator } from "../../app/src/agents/orchestrator";
import { PortfolioManager, RiskOfficer } from "../../app/src/agents/decision";
import { TechnicalAnalyst } from "../../app/src/agents/analysis";
import { StaticMarketDataSource } from "../../app/src/tools/market-data";

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

function evaluateSample() {
  const priceHistory = makeBars([100, 102, 101, 104, 106, 105]);
  const context = createAnalysisContext({
    symbol: "TEST",
    priceHistory,
    indicators: computeIndicators(priceHistory),
    fundamentals: { pe_ratio: 15, debt_to_asset: 0.4 },
    news: [{ title: "Strong growth", summary: "Record quarter" }],
  });
  const orchestrator = new MeetingOrchestrator({
    dataSource: new StaticMarketDataSource(),
    agents: createScoringAgents(),
    portfolioManager: new PortfolioManager(),
  });
  return orchestrator.evaluate(context);
}

describe("Decision serialization", () => {
  it("should round-trip a decision", () => {
    const { backtest: _backtest, ...decision } = evaluateSample();

    const parsed = parseDecision(serializeDecision(decision));

    expect(parsed).toEqual(decision);
    expect(parsed.orders).toHaveLength(1);
  });

  it("should round-trip a decision with its backtest", () => {
    const result = evaluateSample();

    expect(parseDecisionWithBacktest(serializeDecision(result))).toEqual(result);
  });

  it("should round-trip a meeting result with a failed symbol", () => {
    const result: MeetingResult = {
      TEST: evaluateSample(),
      BAD: { symbol: "BAD", error: { name: "DataRetrievalError", message: "No price history for BAD" } },
    };

    expect(parseMeetingResult(serializeDecision(result))).toEqual(result);
  });

  it("should round-trip a decision synthesized from a NaN score", () => {
    const priceHistory = makeBars([100, 101, 102]);
    const context = createAnalysisContext({
      symbol: "TEST",
      priceHistory,
      indicators: computeIndicators(priceHistory),
    });
    const reports = [
      new TechnicalAnalyst().analyze(context),
      new RiskOfficer().analyze(context),
      { agent_name: "Broken Analyst", symbol: "TEST", score: NaN, rationale: "", metadata: {} },
    ];

    const decision = new PortfolioManager().synthesize(reports, context);
    const parsed = parseDecision(serializeDecision(decision));

    expect(parsed).toEqual(decision);
    expect(parsed.agent_reports[2].score).toBe(0);
    expect(parsed.orders).toEqual([]);
  });

  it("should indent with two spaces by default", () => {
    const json = serializeDecision(evaluateSample());

    expect(json.split("\n")[1]).toBe('  "as_of_date": "2024-01-06",');
  });

  it("should reject text that is not JSON", () => {
    expect(() => parseDecision("{not json")).toThrow(InvalidInputError);
    expect(() => parseDecision("{not json")).toThrow(/^Serialized decision is not valid JSON/);
  });

  it("should report the path of an invalid field", () => {
    const { backtest: _backtest, ...decision } = evaluateSample();
    const broken = JSON.stringify({
      ...decision,
      orders: decision.orders.map((o) => ({ ...o, weight: 2 })),
    });

    try {
      parseDecision(broken);
      expect.unreachable("parseDecision should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      if (!(error instanceof InvalidInputError)) return;
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0].startsWith("orders.0.weight:")).toBe(true);
    }
  });
});
