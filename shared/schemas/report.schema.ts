import { z } from "zod";
import { DateStringSchema } from "./market.schema";
import { OrderActionSchema } from "./agent.schema";

const FiniteNumberSchema = z.number().finite();

// Output of a single scoring agent
export const AgentReportSchema = z.object({
  agent_name: z.string(),
  symbol: z.string(),
  score: FiniteNumberSchema.min(-1).max(1),
  rationale: z.string(),
  metadata: z.record(z.string(), z.unknown()),
});

// Single-asset order produced by synthesis
export const OrderSchema = z.object({
  symbol: z.string(),
  action: OrderActionSchema,
  weight: FiniteNumberSchema.min(0).max(1),
  entry_rule: z.string(),
  stop: FiniteNumberSchema,
  take_profit: FiniteNumberSchema,
  rationale: z.string(),
});

// Synthesized trade decision
export const DecisionSchema = z.object({
  as_of_date: DateStringSchema.nullable(),
  symbol: z.string(),
  composite_score: FiniteNumberSchema,
  orders: z.array(OrderSchema).max(1),
  max_gross_exposure: FiniteNumberSchema,
  notes: z.string(),
  agent_reports: z.array(AgentReportSchema),
});

// Retrospective performance of a decision
export const BacktestReportSchema = z.object({
  start_date: DateStringSchema.nullable(),
  end_date: DateStringSchema.nullable(),
  total_return: FiniteNumberSchema,
  annualized_return: FiniteNumberSchema,
  sharpe_ratio: FiniteNumberSchema,
  max_drawdown: FiniteNumberSchema,
  cumulative_returns: z.object({
    portfolio: FiniteNumberSchema,
    benchmark: FiniteNumberSchema,
  }),
});

export const DecisionWithBacktestSchema = DecisionSchema.extend({
  backtest: BacktestReportSchema,
});

// Per-symbol error marker
export const SymbolFailureSchema = z.object({
  symbol: z.string(),
  error: z.object({
    name: z.string(),
    message: z.string(),
  }),
});

export const SymbolOutcomeSchema = z.union([DecisionWithBacktestSchema, SymbolFailureSchema]);

export const MeetingResultSchema = z.record(z.string(), SymbolOutcomeSchema);

// Types
export type AgentReport = z.infer<typeof AgentReportSchema>;
export type Order = z.infer<typeof OrderSchema>;
export type Decision = z.infer<typeof DecisionSchema>;
export type BacktestReport = z.infer<typeof BacktestReportSchema>;
export type DecisionWithBacktest = z.infer<typeof DecisionWithBacktestSchema>;
export type SymbolFailure = z.infer<typeof SymbolFailureSchema>;
export type SymbolOutcome = z.infer<typeof SymbolOutcomeSchema>;
export type MeetingResult = z.infer<typeof MeetingResultSchema>;
