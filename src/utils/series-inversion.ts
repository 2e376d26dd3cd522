import { Bar, InversionMode, Series } from '../patterns/types.js';

import { calculateMedian } from './calculations.js';
import { InvalidInputError } from './errors.js';

export interface InvertedSeries {
  mode: InversionMode;
  /** Mirror pivot (median close of the original series); 0 for negate. */
  pivot: number;
  bars: Bar[];
}

/**
 * Median of the finite closes of a series, the fixed point of the mirror transform.
 */
export const medianClose = (series: Series): number => {
  if (series.length === 0) {
    throw new InvalidInputError('median close is undefined for an empty series', 'series');
  }
  const closes = series.map(bar => bar.close).filter(Number.isFinite);
  if (closes.length === 0) {
    throw new InvalidInputError('series has no finite close to take a median of', 'series');
  }
  return calculateMedian(closes);
};

// high and low swap roles so that high >= low still holds after the transform
const reflectBar = (bar: Bar, transform: (price: number) => number): Bar => ({
  ...bar,
  open: transform(bar.open),
  high: transform(bar.low),
  low: transform(bar.high),
  close: transform(bar.close),
});

/**
 * p -> -p for every price. Applying it twice gives back the original bars exactly.
 * Prices become negative.
 */
export const negateSeries = (series: Series): Bar[] => {
  return series.map(bar => reflectBar(bar, price => -price));
};

/**
 * p -> 2M - p around the pivot M (default: the median close).
 *
 * Prices stay positive only while every original price is below 2M; a series with a spike
 * above twice its median produces negative mirrored prices.
 */
export const mirrorSeries = (series: Series, pivot: number = medianClose(series)): Bar[] => {
  if (series.length === 0) {
    throw new InvalidInputError('cannot mirror an empty series', 'series');
  }
  return series.map(bar => reflectBar(bar, price => 2 * pivot - price));
};

export const invertSeries = (series: Series, mode: InversionMode): InvertedSeries => {
  if (mode === 'negate') {
    return { mode, pivot: 0, bars: negateSeries(series) };
  }
  const pivot = medianClose(series);
  return { mode, pivot, bars: mirrorSeries(series, pivot) };
};

/**
 * The level transform matching `invertSeries`. The scanner compares raw prices against the
 * level it is given, so a caller scanning inverted bars must pass the inverted level too.
 */
export const invertLevel = (level: number, mode: InversionMode, pivot: number): number => {
  return mode === 'negate' ? -level : 2 * pivot - level;
};
