import type { AgentReport, AgentType } from "@investment-desk/shared";
import type { AnalysisContext } from "../core/context";
import { clamp, isFiniteNumber } from "../utils/math";

// ============================================
// Base Agent Interface
// ============================================

export interface AgentConfig {
  type: AgentType;
  name: string;
  config?: Record<string, unknown>;
}

/**
 * Anything that scores one symbol from its analysis context. Agents are
 * independent of one another and pure given the same context.
 */
export interface ScoringAgent {
  readonly name: string;
  readonly type: AgentType;
  analyze(context: AnalysisContext): AgentReport;
}

// ============================================
// Base Agent Class
// ============================================

export abstract class BaseAgent implements ScoringAgent {
  readonly type: AgentType;
  readonly name: string;
  protected config: Record<string, unknown>;

  constructor(agentConfig: AgentConfig) {
    this.type = agentConfig.type;
    this.name = agentConfig.name;
    this.config = agentConfig.config || {};
  }

  abstract analyze(context: AnalysisContext): AgentReport;

  // ============================================
  // Utility Methods
  // ============================================

  /**
   * Build a report with the score clamped to [-1, 1]. NaN becomes 0.
   */
  protected report(
    context: AnalysisContext,
    score: number,
    rationale: string,
    metadata: Record<string, unknown> = {},
  ): AgentReport {
    return {
      agent_name: this.name,
      symbol: context.symbol,
      score: Number.isNaN(score) ? 0 : clamp(score, -1, 1),
      rationale,
      metadata,
    };
  }

  /**
   * Read a numeric knob from `config`, falling back when unset or invalid
   */
  protected numberSetting(key: string, fallback: number): number {
    const value = this.config[key];
    return isFiniteNumber(value) ? value : fallback;
  }

  /**
   * Log info message
   */
  protected log(message: string, data?: Record<string, unknown>): void {
    console.log(`[${this.name}] ${message}`, data || "");
  }

  /**
   * Log error message
   */
  protected logError(message: string, error?: unknown): void {
    console.error(`[${this.name}] ${message}`, error || "");
  }
}
