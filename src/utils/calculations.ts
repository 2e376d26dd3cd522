// Helper formatting functions
export const formatPrice = (value: number): string => {
  return Math.abs(value) >= 1000 ? value.toFixed(2) : value.toFixed(4);
};

export const formatPercent = (value: number): string => {
  return `${(value * 100).toFixed(2)}%`;
};

export const calculateMean = (values: number[]): number => {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0;
};

/**
 * Standard median: the middle value, or the mean of the two middle values for an even count.
 * Returns NaN for an empty list so callers can decide what an empty median means.
 */
export const calculateMedian = (values: number[]): number => {
  if (values.length === 0) return NaN;

  const sorted = [...values].sort((a, b) => a - b);

  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2;
  }
  return sorted[mid];
};

export const calculateStdDev = (values: number[], mean: number): number => {
  if (values.length <= 1) return 0;

  // n-1 for sample standard deviation
  return Math.sqrt(
    values.reduce((sum, value) => sum + Math.pow(value - mean, 2), 0) / (values.length - 1)
  );
};
