// Re-export all types from schemas
export type {
  // Market data types
  DateString,
  Interval,
  PriceBar,
  NewsItem,
  Fundamentals,

  // Agent types
  AgentType,
  OrderAction,

  // Report types
  AgentReport,
  Order,
  Decision,
  BacktestReport,
  DecisionWithBacktest,
  SymbolFailure,
  SymbolOutcome,
  MeetingResult,
} from "../schemas";
