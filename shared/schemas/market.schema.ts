import { z } from "zod";

// Date-only string, e.g. "2024-03-28"
export const DateStringSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

// Bar interval supported by market data sources
export const IntervalSchema = z.enum(["1d", "1wk", "1mo"]);

// OHLCV bar
export const PriceBarSchema = z.object({
  timestamp: z.coerce.date(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number().positive(),
  volume: z.number().nonnegative(),
});

// News item (providers may attach more fields; only title/summary are read)
export const NewsItemSchema = z
  .object({
    title: z.string().nullish(),
    summary: z.string().nullish(),
  })
  .passthrough();

// Fundamental snapshot: metric name -> value, null when unknown
export const FundamentalsSchema = z.record(z.string(), z.number().nullable());

// Types
export type DateString = z.infer<typeof DateStringSchema>;
export type Interval = z.infer<typeof IntervalSchema>;
export type PriceBar = z.infer<typeof PriceBarSchema>;
export type NewsItem = z.infer<typeof NewsItemSchema>;
export type Fundamentals = z.infer<typeof FundamentalsSchema>;
