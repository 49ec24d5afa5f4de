import type { PriceBar } from "@investment-desk/shared";

// ============================================
// Indicator Types
// ============================================

export const DEFAULT_WINDOWS: readonly number[] = [5, 10, 20, 50, 100, 200];

export const RSI_PERIOD = 14;
export const MACD_FAST = 12;
export const MACD_SLOW = 26;
export const MACD_SIGNAL = 9;
export const BOLLINGER_PERIOD = 20;
export const BOLLINGER_STD_DEV = 2;

/**
 * Indicator values for one bar. Only indicators with a complete lookback
 * window are present, so every value is a finite number.
 */
export interface IndicatorRow {
  timestamp: Date;
  values: Readonly<Record<string, number>>;
}

export interface IndicatorMeta {
  readonly insufficient_history: boolean;
  readonly observations: number;
  readonly min_required: number;
}

export interface IndicatorTable {
  readonly rows: readonly IndicatorRow[];
  readonly meta: IndicatorMeta;
}

type Series = Array<number | null>;

function emptySeries(length: number): Series {
  return Array.from({ length }, () => null);
}

// ============================================
// Indicator Engine
// ============================================

export class IndicatorEngine {
  private readonly windows: readonly number[];

  constructor(windows: readonly number[] = DEFAULT_WINDOWS) {
    this.windows = [...windows];
  }

  /**
   * Compute moving averages, RSI, MACD and Bollinger bands for every bar.
   * Bars without a single defined indicator are dropped.
   */
  compute(bars: readonly PriceBar[]): IndicatorTable {
    const closes = bars.map((b) => b.close);
    const series: Record<string, Series> = {};

    // Moving Averages
    for (const window of this.windows) {
      series[`sma_${window}`] = this.sma(closes, window);
      series[`ema_${window}`] = this.ema(closes, window);
    }

    // Momentum
    series.rsi = this.rsi(closes, RSI_PERIOD);

    const macd = this.macd(closes);
    series.macd = macd.line;
    series.macd_signal = macd.signal;
    series.macd_hist = macd.histogram;

    // Volatility
    const bands = this.bollingerBands(closes, BOLLINGER_PERIOD, BOLLINGER_STD_DEV);
    series.bb_upper = bands.upper;
    series.bb_lower = bands.lower;

    const rows: IndicatorRow[] = [];
    for (let i = 0; i < bars.length; i++) {
      const values: Record<string, number> = {};
      for (const [name, column] of Object.entries(series)) {
        const value = column[i];
        if (value !== null && Number.isFinite(value)) {
          values[name] = value;
        }
      }
      if (Object.keys(values).length > 0) {
        rows.push({ timestamp: bars[i].timestamp, values: Object.freeze(values) });
      }
    }

    const minRequired = this.windows.length > 0 ? Math.max(...this.windows) : 0;
    const meta: IndicatorMeta = Object.freeze({
      insufficient_history: rows.length === 0 || bars.length < minRequired,
      observations: bars.length,
      min_required: minRequired,
    });

    return Object.freeze({ rows: Object.freeze(rows), meta });
  }

  // ============================================
  // Moving Averages
  // ============================================

  private sma(data: readonly number[], period: number): Series {
    const out = emptySeries(data.length);
    if (period <= 0) return out;

    let sum = 0;
    for (let i = 0; i < data.length; i++) {
      sum += data[i];
      if (i >= period) sum -= data[i - period];
      if (i >= period - 1) out[i] = sum / period;
    }
    return out;
  }

  /**
   * Recursive EMA seeded with the first observation, so it has no warm-up.
   */
  private ema(data: readonly (number | null)[], period: number): Series {
    return this.smooth(data, 2 / (period + 1));
  }

  private smooth(data: readonly (number | null)[], alpha: number): Series {
    const out: Series = [];
    let prev: number | null = null;

    for (const value of data) {
      if (value === null) {
        out.push(prev);
        continue;
      }
      prev = prev === null ? value : alpha * value + (1 - alpha) * prev;
      out.push(prev);
    }
    return out;
  }

  // ============================================
  // Momentum Indicators
  // ============================================

  private rsi(closes: readonly number[], period: number): Series {
    const gains: Array<number | null> = [null];
    const losses: Array<number | null> = [null];
    for (let i = 1; i < closes.length; i++) {
      const change = closes[i] - closes[i - 1];
      gains.push(change > 0 ? change : 0);
      losses.push(change < 0 ? -change : 0);
    }

    const avgGain = this.smooth(gains, 1 / period);
    const avgLoss = this.smooth(losses, 1 / period);

    return avgGain.map((gain, i) => {
      const loss = avgLoss[i];
      if (i === 0 || gain === null || loss === null) return null;
      // No losses in the window: RS is unbounded
      if (loss === 0) return 100;
      return 100 - 100 / (1 + gain / loss);
    });
  }

  private macd(closes: readonly number[]): { line: Series; signal: Series; histogram: Series } {
    const fast = this.ema(closes, MACD_FAST);
    const slow = this.ema(closes, MACD_SLOW);

    const line: Series = fast.map((f, i) => {
      const s = slow[i];
      return f !== null && s !== null ? f - s : null;
    });
    const signal = this.ema(line, MACD_SIGNAL);
    const histogram: Series = line.map((m, i) => {
      const s = signal[i];
      return m !== null && s !== null ? m - s : null;
    });

    return { line, signal, histogram };
  }

  // ============================================
  // Volatility Indicators
  // ============================================

  private bollingerBands(
    closes: readonly number[],
    period: number,
    stdDev: number,
  ): { upper: Series; lower: Series } {
    const upper = emptySeries(closes.length);
    const lower = emptySeries(closes.length);
    if (period < 2) return { upper, lower };

    for (let i = period - 1; i < closes.length; i++) {
      const slice = closes.slice(i - period + 1, i + 1);
      const middle = slice.reduce((a, b) => a + b, 0) / period;
      const variance = slice.reduce((sum, c) => sum + Math.pow(c - middle, 2), 0) / (period - 1);
      const std = Math.sqrt(variance);

      upper[i] = middle + stdDev * std;
      lower[i] = middle - stdDev * std;
    }

    return { upper, lower };
  }
}

export const indicatorEngine = new IndicatorEngine();

export function computeIndicators(bars: readonly PriceBar[], windows?: readonly number[]): IndicatorTable {
  return windows ? new IndicatorEngine(windows).compute(bars) : indicatorEngine.compute(bars);
}

/**
 * Most recent row of the table, or null when the table is empty.
 */
export function latestRow(table: IndicatorTable): IndicatorRow | null {
  return table.rows.length > 0 ? table.rows[table.rows.length - 1] : null;
}
