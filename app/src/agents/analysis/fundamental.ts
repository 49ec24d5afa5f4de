import type { AgentReport } from "@investment-desk/shared";
import { BaseAgent, type AgentConfig } from "../base";
import type { AnalysisContext } from "../../core/context";
import { clamp, isFiniteNumber } from "../../utils/math";

// ============================================
// Fundamental Analyst Agent
// ============================================

const DEFAULT_CONFIG: AgentConfig = {
  type: "fundamental_analyst",
  name: "Fundamental Analyst",
};

export const FUNDAMENTAL_METRICS = [
  "pe_ratio",
  "pb_ratio",
  "dividend_yield",
  "debt_to_asset",
  "esg_score",
] as const;

export type FundamentalMetric = (typeof FUNDAMENTAL_METRICS)[number];

export class FundamentalAnalyst extends BaseAgent {
  constructor(config: Partial<AgentConfig> = {}) {
    super({ ...DEFAULT_CONFIG, ...config });
  }

  analyze(context: AnalysisContext): AgentReport {
    const metrics = this.readMetrics(context);

    if (Object.keys(metrics).length === 0) {
      this.log(`No fundamentals for ${context.symbol}`);
      return this.report(context, 0, "Fundamentals unavailable", {});
    }

    let score = 0;
    const reasons: string[] = [];

    const pe = metrics.pe_ratio;
    if (pe !== undefined) {
      if (pe > 0 && pe < 25) {
        score += 0.25;
        reasons.push(`PE attractive at ${pe.toFixed(1)}`);
      } else if (pe >= 40) {
        score -= 0.15;
        reasons.push(`PE elevated at ${pe.toFixed(1)}`);
      }
    }

    const pb = metrics.pb_ratio;
    if (pb !== undefined) {
      if (pb < 4) {
        score += 0.1;
        reasons.push(`PB reasonable at ${pb.toFixed(1)}`);
      } else if (pb > 8) {
        score -= 0.1;
        reasons.push(`PB high at ${pb.toFixed(1)}`);
      }
    }

    const dividendYield = metrics.dividend_yield;
    if (dividendYield !== undefined) {
      score += Math.min(dividendYield * 5, 0.1);
      reasons.push(`Dividend yield ${(dividendYield * 100).toFixed(2)}%`);
    }

    const debtToAsset = metrics.debt_to_asset;
    if (debtToAsset !== undefined) {
      if (debtToAsset < 0.6) {
        score += 0.15;
        reasons.push(`Leverage manageable (${debtToAsset.toFixed(2)})`);
      } else {
        score -= 0.15;
        reasons.push(`Leverage high (${debtToAsset.toFixed(2)})`);
      }
    }

    const esg = metrics.esg_score;
    if (esg !== undefined) {
      score += clamp((esg - 50) / 200, -0.05, 0.1);
      reasons.push(`ESG score ${esg.toFixed(1)}`);
    }

    const report = this.report(
      context,
      score,
      reasons.length > 0 ? reasons.join("; ") : "No decisive fundamental signals",
      metrics,
    );

    this.log(`Analysis complete for ${context.symbol}: ${report.score.toFixed(2)}`);
    return report;
  }

  /**
   * Known metrics with a finite value. Null, NaN and infinite values are
   * treated as missing.
   */
  private readMetrics(context: AnalysisContext): Partial<Record<FundamentalMetric, number>> {
    const metrics: Partial<Record<FundamentalMetric, number>> = {};
    for (const key of FUNDAMENTAL_METRICS) {
      const value = context.fundamentals[key];
      if (isFiniteNumber(value)) {
        metrics[key] = value;
      }
    }
    return metrics;
  }
}
