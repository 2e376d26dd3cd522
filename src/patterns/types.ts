export interface Bar {
  timestamp: string; // e.g. "2024-05-01 09:35:00" or an ISO string
  open: number;
  high: number;
  low: number;
  close: number;
  volume?: number;
}

export type Series = readonly Bar[];

/**
 * Indicator values aligned with a Series. `undefined` (or NaN) marks positions where the
 * indicator has no value yet, e.g. the ATR warm-up bars.
 */
export type IndicatorSeries = ReadonlyArray<number | undefined>;

export interface ScanParameters {
  readonly tolerance: number;
  readonly maxRetestWindow: number;
  readonly takeoffWindow: number;
  readonly takeoffPct: number;
  readonly atrEnabled: boolean;
  readonly atrMult: number;
  readonly atrLookback?: number;
}

export interface Signal {
  readonly breakout_index: number;
  readonly breakout_time: string;
  readonly retest_index: number;
  readonly retest_time: string;
  readonly takeoff_index: number;
  readonly takeoff_time: string;
  readonly level: number;
  readonly retest_low: number;
  readonly takeoff_close: number;
  readonly return_from_level: number; // fraction, 0.035 for 3.5%
  readonly bars_to_retest: number;
  readonly bars_to_takeoff: number;
  readonly atr_at_takeoff: number | null;
}

export type InversionMode = 'mirror' | 'negate';
