// ============================================
// Numeric Helpers
// ============================================

export const TRADING_DAYS_PER_YEAR = 252;

/**
 * Return samples shorter than this are treated as degenerate and give a
 * volatility of zero.
 */
export const MIN_VOLATILITY_SAMPLES = 3;

export function clamp(value: number, lower: number, upper: number): number {
  if (value < lower) return lower;
  if (value > upper) return upper;
  return value;
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Standard deviation with `ddof` delta degrees of freedom (0 = population,
 * 1 = sample). Returns 0 when there are not enough observations.
 */
export function standardDeviation(values: readonly number[], ddof: 0 | 1 = 0): number {
  const n = values.length;
  if (n - ddof <= 0) return 0;

  const avg = mean(values);
  const squaredDiffs = values.reduce((sum, v) => sum + Math.pow(v - avg, 2), 0);
  return Math.sqrt(squaredDiffs / (n - ddof));
}

export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Simple period-over-period returns. The first bar has no predecessor and
 * yields no return.
 */
export function simpleReturns(closes: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const previous = closes[i - 1];
    const r = closes[i] / previous - 1;
    if (previous > 0 && Number.isFinite(r)) {
      returns.push(r);
    }
  }
  return returns;
}

/**
 * Annualized volatility: population standard deviation of simple returns
 * scaled by the square root of the periods per year.
 */
export function annualizedVolatility(
  closes: readonly number[],
  periodsPerYear: number = TRADING_DAYS_PER_YEAR,
): number {
  const returns = simpleReturns(closes);
  if (returns.length < MIN_VOLATILITY_SAMPLES) return 0;

  const volatility = standardDeviation(returns, 0) * Math.sqrt(periodsPerYear);
  return Number.isFinite(volatility) ? volatility : 0;
}

export function toDateString(date: Date): string {
  return date.toISOString().split("T")[0];
}
