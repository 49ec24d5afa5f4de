import type { AgentReport, Decision, Order } from "@investment-desk/shared";
import type { AnalysisContext } from "../../core/context";
import { DEFAULT_DESK_CONFIG } from "../../core/config";
import { InvalidInputError } from "../../core/errors";
import { clamp, isFiniteNumber, mean, roundTo, toDateString } from "../../utils/math";
import { RISK_OFFICER_NAME } from "./risk-officer";

// ============================================
// Portfolio Manager
// ============================================

/**
 * PortfolioManager synthesizes the scoring agents' reports into one
 * single-asset decision. It does not score the symbol itself.
 */

export interface PortfolioManagerConfig {
  name: string;
  /** Composite score needed before any order is placed */
  minConfidence: number;
  maxGrossExposure: number;
  /** Weight cap used when no Risk Officer report is present */
  defaultMaxWeight: number;
  /** Order template */
  entryRule: string;
  stop: number;
  takeProfit: number;
}

const DEFAULT_CONFIG: PortfolioManagerConfig = {
  name: "Portfolio Manager",
  minConfidence: DEFAULT_DESK_CONFIG.minConfidence,
  maxGrossExposure: DEFAULT_DESK_CONFIG.maxGrossExposure,
  defaultMaxWeight: DEFAULT_DESK_CONFIG.maxWeightPerAsset,
  entryRule: "SMA20>SMA50 & MACD histogram positive",
  stop: 0.08,
  takeProfit: 0.2,
};

export const HOLDING_CASH_NOTE = "Confidence below threshold; holding cash";

export class PortfolioManager {
  readonly name: string;
  private config: PortfolioManagerConfig;

  constructor(config: Partial<PortfolioManagerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.name = this.config.name;
  }

  synthesize(reports: readonly AgentReport[], context: AnalysisContext): Decision {
    if (reports.length === 0) {
      throw new InvalidInputError("Portfolio manager requires at least one agent report");
    }

    // Embedded copies carry the score that entered the average
    const sanitized = reports.map((r) => ({
      ...r,
      score: isFiniteNumber(r.score) ? clamp(r.score, -1, 1) : 0,
    }));
    const compositeScore = mean(sanitized.map((r) => r.score));
    const lastBar = context.priceHistory[context.priceHistory.length - 1];

    let orders: Order[] = [];
    let notes = HOLDING_CASH_NOTE;

    if (compositeScore >= this.config.minConfidence) {
      const limits = this.riskLimits(sanitized);
      const weight = roundTo(clamp(compositeScore, 0, 1) * limits.maxWeight, 4);

      orders = [
        {
          symbol: context.symbol,
          action: compositeScore > 0 ? "buy" : "hold",
          weight,
          entry_rule: this.config.entryRule,
          stop: this.config.stop,
          take_profit: this.config.takeProfit,
          rationale: sanitized
            .map((r) => r.rationale)
            .filter((r) => r.length > 0)
            .join("; "),
        },
      ];
      notes = limits.maxSectorExposure !== null
        ? `Diversify across sectors; keep sector exposure below ${(limits.maxSectorExposure * 100).toFixed(0)}%`
        : "Diversify across sectors";
    }

    this.log(
      `Decision for ${context.symbol}: ${orders.length > 0 ? `${orders[0].action.toUpperCase()} ${orders[0].weight}` : "HOLD CASH"} ` +
        `(composite: ${compositeScore.toFixed(3)})`,
    );

    return {
      as_of_date: lastBar ? toDateString(lastBar.timestamp) : null,
      symbol: context.symbol,
      composite_score: compositeScore,
      orders,
      max_gross_exposure: this.config.maxGrossExposure,
      notes,
      agent_reports: sanitized,
    };
  }

  /**
   * Limits published by the Risk Officer, or the defaults when it did not report
   */
  private riskLimits(reports: readonly AgentReport[]): {
    maxWeight: number;
    maxSectorExposure: number | null;
  } {
    const risk = reports.find((r) => r.agent_name === RISK_OFFICER_NAME);
    const maxWeight = risk?.metadata.max_weight_per_asset;
    const maxSectorExposure = risk?.metadata.max_sector_exposure;

    return {
      maxWeight: isFiniteNumber(maxWeight) ? maxWeight : this.config.defaultMaxWeight,
      maxSectorExposure: isFiniteNumber(maxSectorExposure) ? maxSectorExposure : null,
    };
  }

  private log(message: string): void {
    console.log(`[${this.name}] ${message}`);
  }
}
