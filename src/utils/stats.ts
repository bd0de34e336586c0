/**
 * Basic descriptive statistics
 */

export function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Sample standard deviation (divisor n - 1).
 * A single value has no spread, so it returns 0 rather than NaN.
 */
export function sampleStd(values: number[], avg: number = mean(values)): number {
  if (values.length < 2) {
    return 0;
  }
  const variance = values.reduce((sum, v) => sum + Math.pow(v - avg, 2), 0) / (values.length - 1);
  return Math.sqrt(variance);
}
