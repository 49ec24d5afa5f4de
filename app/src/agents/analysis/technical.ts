import type { AgentReport } from "@investment-desk/shared";
import { BaseAgent, type AgentConfig } from "../base";
import type { AnalysisContext } from "../../core/context";
import { latestRow } from "../../tools/technical";
import { annualizedVolatility, clamp, isFiniteNumber } from "../../utils/math";

// ============================================
// Technical Analyst Agent
// ============================================

const DEFAULT_CONFIG: AgentConfig = {
  type: "technical_analyst",
  name: "Technical Analyst",
};

// Signed contribution of each signal to the trend score
const TECHNICAL_WEIGHTS = {
  maCross: 0.3,
  macd: 0.2,
  rsiHealthy: 0.2,
  rsiOversold: -0.1,
  rsiOverbought: -0.2,
  bollinger: 0.1,
  volatilityCap: 0.2,
};

const RSI_BANDS = {
  healthyLow: 45,
  healthyHigh: 70,
  oversold: 35,
  overbought: 75,
};

export class TechnicalAnalyst extends BaseAgent {
  constructor(config: Partial<AgentConfig> = {}) {
    super({ ...DEFAULT_CONFIG, ...config });
  }

  analyze(context: AnalysisContext): AgentReport {
    const { priceHistory, indicators } = context;
    const latest = latestRow(indicators);

    if (priceHistory.length === 0 || latest === null || indicators.meta.insufficient_history) {
      this.log(`Insufficient data for ${context.symbol}`, {
        observations: indicators.meta.observations,
        required: indicators.meta.min_required,
      });
      return this.report(context, 0, "Insufficient data: price history too short to compute indicators", {
        indicators_available: false,
        price_points: priceHistory.length,
        required_points: indicators.meta.min_required,
      });
    }

    const ind = latest.values;
    const close = priceHistory[priceHistory.length - 1].close;
    let score = 0;
    const reasons: string[] = [];

    // Trend direction
    const smaFast = ind.sma_20;
    const smaSlow = ind.sma_50;
    if (isFiniteNumber(smaFast) && isFiniteNumber(smaSlow)) {
      if (smaFast > smaSlow) {
        score += TECHNICAL_WEIGHTS.maCross;
        reasons.push("SMA20 above SMA50");
      } else {
        score -= TECHNICAL_WEIGHTS.maCross;
        reasons.push("SMA20 below SMA50");
      }
    }

    // Momentum
    const histogram = ind.macd_hist;
    if (isFiniteNumber(histogram)) {
      if (histogram > 0) {
        score += TECHNICAL_WEIGHTS.macd;
        reasons.push("MACD histogram positive");
      } else {
        score -= TECHNICAL_WEIGHTS.macd;
        reasons.push("MACD histogram negative");
      }
    }

    const rsi = ind.rsi;
    if (isFiniteNumber(rsi)) {
      if (rsi >= RSI_BANDS.healthyLow && rsi <= RSI_BANDS.healthyHigh) {
        score += TECHNICAL_WEIGHTS.rsiHealthy;
        reasons.push(`RSI neutral-positive (${rsi.toFixed(1)})`);
      } else if (rsi < RSI_BANDS.oversold) {
        score += TECHNICAL_WEIGHTS.rsiOversold;
        reasons.push(`RSI oversold (${rsi.toFixed(1)})`);
      } else if (rsi > RSI_BANDS.overbought) {
        score += TECHNICAL_WEIGHTS.rsiOverbought;
        reasons.push(`RSI overbought (${rsi.toFixed(1)})`);
      }
    }

    // Mean reversion
    const upper = ind.bb_upper;
    const lower = ind.bb_lower;
    if (isFiniteNumber(upper) && isFiniteNumber(lower)) {
      if (close < lower) {
        score += TECHNICAL_WEIGHTS.bollinger;
        reasons.push("Price below lower Bollinger band");
      } else if (close > upper) {
        score -= TECHNICAL_WEIGHTS.bollinger;
        reasons.push("Price above upper Bollinger band");
      }
    }

    // Volatility dampener
    const volatility = annualizedVolatility(priceHistory.map((b) => b.close));
    const cap = TECHNICAL_WEIGHTS.volatilityCap;
    score += clamp(cap - volatility, -cap, cap);
    reasons.push(`Annualized volatility ${volatility.toFixed(2)}`);

    const report = this.report(context, score, reasons.join("; "), {
      indicators_available: true,
      close,
      volatility,
      latest_indicators: { ...ind },
    });

    this.log(`Analysis complete for ${context.symbol}: ${report.score.toFixed(2)}`);
    return report;
  }
}
