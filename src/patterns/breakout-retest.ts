import { z } from 'zod';

import { DEFAULT_ATR_LOOKBACK, prepareIndicators } from '../utils/atr-calculator.js';
import { InvalidInputError } from '../utils/errors.js';

import { IndicatorSeries, ScanParameters, Series, Signal } from './types.js';

export const DEFAULT_SCAN_PARAMETERS: ScanParameters = {
  tolerance: 0.001,
  maxRetestWindow: 20,
  takeoffWindow: 20,
  takeoffPct: 0.005,
  atrEnabled: true,
  atrMult: 1.0,
  atrLookback: DEFAULT_ATR_LOOKBACK,
};

const ScanParametersSchema = z
  .object({
    tolerance: z.number().gt(0, 'must be greater than 0'),
    maxRetestWindow: z.number().int().positive(),
    takeoffWindow: z.number().int().positive(),
    takeoffPct: z.number().nonnegative(),
    atrEnabled: z.boolean(),
    atrMult: z.number(),
    atrLookback: z.number().int().positive().optional(),
  })
  .refine(params => !params.atrEnabled || Number.isFinite(params.atrMult), {
    message: 'must be a finite number when ATR is enabled',
    path: ['atrMult'],
  });

/**
 * Checks a parameter set and throws InvalidInputError naming the first offending field.
 */
export const validateScanParameters = (parameters: ScanParameters): ScanParameters => {
  const result = ScanParametersSchema.safeParse(parameters);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InvalidInputError(issue.message, issue.path.join('.') || 'parameters');
  }
  return parameters;
};

type ScanState =
  | { phase: 'seekingBreakout' }
  | { phase: 'seekingRetest'; breakoutIndex: number; deadline: number }
  | {
      phase: 'seekingTakeoff';
      breakoutIndex: number;
      retestIndex: number;
      retestLow: number;
      deadline: number;
    };

const definedIndicator = (value: number | undefined): number | undefined =>
  value !== undefined && Number.isFinite(value) ? value : undefined;

/**
 * Detects breakout -> retest -> takeoff sequences around `level` in a single forward pass.
 *
 * - Breakout at i: close[i] > level and close[i-1] <= level.
 * - Retest within `maxRetestWindow` bars after the breakout: the low trades inside
 *   [level - |level| * tolerance, level + |level| * tolerance] and the bar closes above
 *   the level.
 * - Takeoff within `takeoffWindow` bars after the retest: close strictly above
 *   max(level + |level| * takeoffPct, level + ATR * atrMult). The ATR term only applies
 *   when ATR is enabled and defined at that bar.
 *
 * For a positive level these are the usual level * (1 +/- tolerance) bands, and
 * return_from_level equals takeoff_close / level - 1.
 *
 * A candidate whose deadline passes, or that is still open when the series ends, is dropped
 * and the search restarts at the bar after its breakout. After a completed signal the
 * search continues at the bar after the takeoff.
 *
 * @param series Bars in ascending time order
 * @param level Price level the pattern is anchored to
 * @param parameters Scan configuration
 * @param indicators ATR values aligned with `series`; computed from the series when ATR is
 *   enabled and none are given
 * @returns Signals ordered by takeoff index (possibly empty)
 *
 * @example
 * ```typescript
 * const signals = scanBreakoutRetests(bars, 100, { ...DEFAULT_SCAN_PARAMETERS, atrEnabled: false });
 * signals.forEach(s => console.log(`${s.takeoff_time}: ${s.return_from_level}`));
 * ```
 */
export function scanBreakoutRetests(
  series: Series,
  level: number,
  parameters: ScanParameters,
  indicators?: IndicatorSeries
): Signal[] {
  if (!Number.isFinite(level)) {
    throw new InvalidInputError(`must be a finite number, got ${level}`, 'level');
  }
  if (level === 0) {
    throw new InvalidInputError('must be non-zero, returns are measured relative to it', 'level');
  }
  if (series.length < 2) {
    throw new InvalidInputError(
      `at least 2 bars are required, got ${series.length}`,
      'series'
    );
  }
  validateScanParameters(parameters);
  if (indicators && indicators.length !== series.length) {
    throw new InvalidInputError(
      `expected ${series.length} values aligned with the series, got ${indicators.length}`,
      'indicators'
    );
  }

  const atr: IndicatorSeries | undefined = parameters.atrEnabled
    ? (indicators ?? prepareIndicators(series, parameters.atrLookback ?? DEFAULT_ATR_LOOKBACK))
    : undefined;

  // Offsets scale with |level| so a negated series (negative level) keeps a valid zone
  const scale = Math.abs(level);
  const zoneLow = level - scale * parameters.tolerance;
  const zoneHigh = level + scale * parameters.tolerance;
  const pctThreshold = level + scale * parameters.takeoffPct;

  const takeoffThreshold = (i: number): number => {
    const atrValue = atr ? definedIndicator(atr[i]) : undefined;
    if (atrValue === undefined) {
      return pctThreshold;
    }
    return Math.max(pctThreshold, level + atrValue * parameters.atrMult);
  };

  const signals: Signal[] = [];
  let state: ScanState = { phase: 'seekingBreakout' };
  let i = 1;

  while (i < series.length) {
    const bar = series[i];

    switch (state.phase) {
      case 'seekingBreakout': {
        if (bar.close > level && series[i - 1].close <= level) {
          state = {
            phase: 'seekingRetest',
            breakoutIndex: i,
            deadline: i + parameters.maxRetestWindow,
          };
        }
        i++;
        break;
      }

      case 'seekingRetest': {
        if (i > state.deadline) {
          i = state.breakoutIndex + 1;
          state = { phase: 'seekingBreakout' };
          break;
        }
        if (bar.low >= zoneLow && bar.low <= zoneHigh && bar.close > level) {
          state = {
            phase: 'seekingTakeoff',
            breakoutIndex: state.breakoutIndex,
            retestIndex: i,
            retestLow: bar.low,
            deadline: i + parameters.takeoffWindow,
          };
        }
        i++;
        break;
      }

      case 'seekingTakeoff': {
        if (i > state.deadline) {
          i = state.breakoutIndex + 1;
          state = { phase: 'seekingBreakout' };
          break;
        }
        if (bar.close > takeoffThreshold(i)) {
          const atrAtTakeoff = atr ? definedIndicator(atr[i]) : undefined;
          signals.push(
            Object.freeze({
              breakout_index: state.breakoutIndex,
              breakout_time: series[state.breakoutIndex].timestamp,
              retest_index: state.retestIndex,
              retest_time: series[state.retestIndex].timestamp,
              takeoff_index: i,
              takeoff_time: bar.timestamp,
              level,
              retest_low: state.retestLow,
              takeoff_close: bar.close,
              return_from_level: (bar.close - level) / scale,
              bars_to_retest: state.retestIndex - state.breakoutIndex,
              bars_to_takeoff: i - state.retestIndex,
              atr_at_takeoff: atrAtTakeoff ?? null,
            })
          );
          state = { phase: 'seekingBreakout' };
        }
        i++;
        break;
      }
    }

    // The series ran out with a candidate still open: drop it like a missed deadline
    if (i >= series.length && state.phase !== 'seekingBreakout') {
      i = state.breakoutIndex + 1;
      state = { phase: 'seekingBreakout' };
    }
  }

  return signals;
}

export const scan = scanBreakoutRetests;
