import { z } from "zod";
import { IntervalSchema, type Interval } from "@investment-desk/shared";
import { InvalidInputError } from "./errors";

// ============================================
// Desk Configuration
// ============================================

export interface DeskConfig {
  /** Composite score below which the desk holds cash */
  minConfidence: number;
  /** Gross exposure cap copied onto every decision */
  maxGrossExposure: number;
  /** Per-asset weight cap published by the Risk Officer */
  maxWeightPerAsset: number;
  /** Sector exposure cap published by the Risk Officer */
  maxSectorExposure: number;
  /** Annualized volatility the Risk Officer tolerates without penalty */
  targetVolatility: number;
  /** Bar interval requested from the market data source */
  interval: Interval;
  /** Number of news items requested per symbol */
  newsLimit: number;
}

export const DEFAULT_DESK_CONFIG: Readonly<DeskConfig> = Object.freeze({
  minConfidence: 0.1,
  maxGrossExposure: 1.0,
  maxWeightPerAsset: 0.2,
  maxSectorExposure: 0.5,
  targetVolatility: 0.3,
  interval: "1d",
  newsLimit: 20,
});

const fraction = z.coerce.number().min(0).max(1);

const EnvSchema = z.object({
  DESK_MIN_CONFIDENCE: z.coerce.number().finite().optional(),
  DESK_MAX_GROSS_EXPOSURE: z.coerce.number().positive().finite().optional(),
  RISK_MAX_WEIGHT_PER_ASSET: fraction.optional(),
  RISK_MAX_SECTOR_EXPOSURE: fraction.optional(),
  RISK_TARGET_VOLATILITY: z.coerce.number().nonnegative().finite().optional(),
  DESK_PRICE_INTERVAL: IntervalSchema.optional(),
  DESK_NEWS_LIMIT: z.coerce.number().int().positive().optional(),
});

type Env = Record<string, string | undefined>;

/**
 * Build the desk configuration from environment variables, falling back to
 * defaults for anything unset or blank.
 */
export function loadDeskConfig(env: Env = process.env): DeskConfig {
  // Blank values count as unset
  const present: Env = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") {
      present[key] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new InvalidInputError(`Invalid desk configuration: ${issues.join("; ")}`, issues);
  }

  const vars = parsed.data;
  return {
    minConfidence: vars.DESK_MIN_CONFIDENCE ?? DEFAULT_DESK_CONFIG.minConfidence,
    maxGrossExposure: vars.DESK_MAX_GROSS_EXPOSURE ?? DEFAULT_DESK_CONFIG.maxGrossExposure,
    maxWeightPerAsset: vars.RISK_MAX_WEIGHT_PER_ASSET ?? DEFAULT_DESK_CONFIG.maxWeightPerAsset,
    maxSectorExposure: vars.RISK_MAX_SECTOR_EXPOSURE ?? DEFAULT_DESK_CONFIG.maxSectorExposure,
    targetVolatility: vars.RISK_TARGET_VOLATILITY ?? DEFAULT_DESK_CONFIG.targetVolatility,
    interval: vars.DESK_PRICE_INTERVAL ?? DEFAULT_DESK_CONFIG.interval,
    newsLimit: vars.DESK_NEWS_LIMIT ?? DEFAULT_DESK_CONFIG.newsLimit,
  };
}
