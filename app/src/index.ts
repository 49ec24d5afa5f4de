// Agents
export { BaseAgent, type AgentConfig, type ScoringAgent } from "./agents/base";
export * from "./agents/analysis";
export * from "./agents/decision";
export {
  MeetingOrchestrator,
  createMeetingOrchestrator,
  createScoringAgents,
  type MeetingOrchestratorOptions,
} from "./agents/orchestrator";

// Core
export { createAnalysisContext, type AnalysisContext } from "./core/context";
export { loadDeskConfig, DEFAULT_DESK_CONFIG, type DeskConfig } from "./core/config";
export { InvalidInputError, DataRetrievalError } from "./core/errors";
export {
  serializeDecision,
  parseDecision,
  parseDecisionWithBacktest,
  parseMeetingResult,
} from "./core/serialization";

// Services & tools
export {
  Backtester,
  createBacktester,
  PERIODS_PER_YEAR,
  type BacktestOptions,
  type BacktestCurve,
} from "./services/backtester";
export {
  IndicatorEngine,
  indicatorEngine,
  computeIndicators,
  latestRow,
  DEFAULT_WINDOWS,
  type IndicatorRow,
  type IndicatorMeta,
  type IndicatorTable,
} from "./tools/technical";
export {
  StaticMarketDataSource,
  type MarketDataSource,
  type StaticMarketData,
} from "./tools/market-data";
