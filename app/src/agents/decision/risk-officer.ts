import type { AgentReport } from "@investment-desk/shared";
import { BaseAgent, type AgentConfig } from "../base";
import type { AnalysisContext } from "../../core/context";
import { DEFAULT_DESK_CONFIG } from "../../core/config";
import { annualizedVolatility, clamp, MIN_VOLATILITY_SAMPLES, simpleReturns } from "../../utils/math";

// ============================================
// Risk Officer Agent
// ============================================

/**
 * RiskOfficer penalizes volatility above target and publishes the position
 * limits the Portfolio Manager must respect. Its metadata is the only
 * channel through which risk constrains synthesis.
 */

export const RISK_OFFICER_NAME = "Risk Officer";

const DEFAULT_CONFIG: AgentConfig = {
  type: "risk_officer",
  name: RISK_OFFICER_NAME,
  config: {
    maxWeightPerAsset: DEFAULT_DESK_CONFIG.maxWeightPerAsset,
    maxSectorExposure: DEFAULT_DESK_CONFIG.maxSectorExposure,
    targetVolatility: DEFAULT_DESK_CONFIG.targetVolatility,
  },
};

// Score when volatility is at or below target
export const BASE_RISK_SCORE = 0.5;

export const UNKNOWN_RISK_RATIONALE = "Insufficient price history to estimate volatility";

export interface RiskLimits {
  max_weight_per_asset: number;
  max_sector_exposure: number;
}

export class RiskOfficer extends BaseAgent {
  constructor(config: Partial<AgentConfig> = {}) {
    super({
      ...DEFAULT_CONFIG,
      ...config,
      config: { ...DEFAULT_CONFIG.config, ...config.config },
    });
  }

  get limits(): RiskLimits {
    return {
      max_weight_per_asset: this.numberSetting("maxWeightPerAsset", DEFAULT_DESK_CONFIG.maxWeightPerAsset),
      max_sector_exposure: this.numberSetting("maxSectorExposure", DEFAULT_DESK_CONFIG.maxSectorExposure),
    };
  }

  get targetVolatility(): number {
    return this.numberSetting("targetVolatility", DEFAULT_DESK_CONFIG.targetVolatility);
  }

  analyze(context: AnalysisContext): AgentReport {
    const closes = context.priceHistory.map((b) => b.close);
    const target = this.targetVolatility;

    // Too few returns: volatility is unknown, so the score stays neutral
    if (simpleReturns(closes).length < MIN_VOLATILITY_SAMPLES) {
      return this.report(context, 0, UNKNOWN_RISK_RATIONALE, {
        ...this.limits,
        target_volatility: target,
        volatility: 0,
        penalty: 0,
        volatility_available: false,
      });
    }

    const volatility = annualizedVolatility(closes);

    const rawPenalty = target > 0 ? (volatility - target) / target : 0;
    const penalty = clamp(rawPenalty, 0, 1);
    const score = clamp(BASE_RISK_SCORE - penalty, -1, 1);

    const report = this.report(
      context,
      score,
      `Annualized volatility ${volatility.toFixed(2)}; penalty ${penalty.toFixed(2)}`,
      {
        ...this.limits,
        target_volatility: target,
        volatility,
        penalty,
        volatility_available: true,
      },
    );

    if (penalty > 0) {
      this.log(`${context.symbol} volatility ${volatility.toFixed(2)} above target ${target.toFixed(2)}`);
    }
    return report;
  }
}
