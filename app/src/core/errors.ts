// ============================================
// Custom Errors
// ============================================

/**
 * Raised when a caller hands the pipeline something it cannot work with:
 * an empty report list, a malformed config value, an invalid serialized
 * decision.
 */
export class InvalidInputError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "InvalidInputError";
    this.issues = issues;
  }
}

/**
 * Raised at the market-data boundary. The orchestrator turns it into a
 * per-symbol failure marker.
 */
export class DataRetrievalError extends Error {
  public readonly symbol: string;
  public readonly originalError?: Error;

  constructor(message: string, details: { symbol: string; originalError?: Error }) {
    super(message);
    this.name = "DataRetrievalError";
    this.symbol = details.symbol;
    this.originalError = details.originalError;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
