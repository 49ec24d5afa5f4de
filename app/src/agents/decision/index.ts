// Decision Agent Exports
export {
  RiskOfficer,
  RISK_OFFICER_NAME,
  BASE_RISK_SCORE,
  UNKNOWN_RISK_RATIONALE,
  type RiskLimits,
} from "./risk-officer";
export {
  PortfolioManager,
  HOLDING_CASH_NOTE,
  type PortfolioManagerConfig,
} from "./portfolio-manager";
