import { Bar, IndicatorSeries, Series } from '../patterns/types.js';

import { InvalidInputError } from './errors.js';

export const DEFAULT_ATR_LOOKBACK = 14;

/**
 * True range of a bar: the largest of its own range and its distance from the previous close.
 * Without a previous bar (the first bar of a series) it is simply high - low.
 */
export const calculateTrueRange = (currentBar: Bar, previousBar?: Bar): number => {
  const highLow = currentBar.high - currentBar.low;
  if (!previousBar) {
    return highLow;
  }

  const highPrevClose = Math.abs(currentBar.high - previousBar.close);
  const lowPrevClose = Math.abs(currentBar.low - previousBar.close);

  // Math.max returns NaN if any argument is NaN, which keeps bad bars visible downstream
  return Math.max(highLow, highPrevClose, lowPrevClose);
};

export const calculateTrueRangeSeries = (series: Series): number[] => {
  return series.map((bar, i) => calculateTrueRange(bar, i > 0 ? series[i - 1] : undefined));
};

/**
 * Average True Range as a simple rolling mean of the trailing `lookback` true ranges.
 * The window counts the current bar, so it needs `lookback - 1` prior bars: position i has
 * a value once i >= lookback - 1. Earlier positions, and any window containing a
 * non-finite true range, are undefined.
 *
 * @param series Bars in ascending time order
 * @param lookback Number of true-range values to average (default: 14)
 * @returns ATR values aligned with `series`
 */
export const prepareIndicators = (
  series: Series,
  lookback: number = DEFAULT_ATR_LOOKBACK
): IndicatorSeries => {
  if (!Number.isInteger(lookback) || lookback <= 0) {
    throw new InvalidInputError(`must be a positive integer, got ${lookback}`, 'lookback');
  }
  if (series.length === 0) {
    throw new InvalidInputError('cannot compute ATR for an empty series', 'series');
  }

  const trueRanges = calculateTrueRangeSeries(series);

  return trueRanges.map((_, i) => {
    if (i < lookback - 1) {
      return undefined;
    }
    const window = trueRanges.slice(i - lookback + 1, i + 1);
    if (!window.every(Number.isFinite)) {
      return undefined;
    }
    return window.reduce((sum, value) => sum + value, 0) / lookback;
  });
};

/**
 * Last defined value of an indicator series, used for the "latest ATR" context line.
 */
export const latestDefinedValue = (indicators: IndicatorSeries): number | undefined => {
  for (let i = indicators.length - 1; i >= 0; i--) {
    const value = indicators[i];
    if (value !== undefined && Number.isFinite(value)) {
      return value;
    }
  }
  return undefined;
};
