import { z } from "zod";

// Agent type - every participant in the investment meeting
export const AgentTypeSchema = z.enum([
  // Analysis
  "technical_analyst",
  "fundamental_analyst",
  "sentiment_analyst",

  // Decision
  "risk_officer",
  "portfolio_manager",
]);

// Order action. Shorting is not modelled.
export const OrderActionSchema = z.enum(["buy", "hold"]);

// Types
export type AgentType = z.infer<typeof AgentTypeSchema>;
export type OrderAction = z.infer<typeof OrderActionSchema>;
