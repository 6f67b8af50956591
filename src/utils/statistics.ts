/**
 * Statistical Utility Functions
 *
 * Shared by the beat detector, the IR DC analyzer and the HRV analyzer.
 * Every function returns 0 for input too short to be meaningful.
 *
 * @module utils/statistics
 */

/**
 * Calculate the mean (average) of an array
 */
export function mean(data: readonly number[]): number {
  if (data.length === 0) return 0;
  let sum = 0;
  for (const value of data) sum += value;
  return sum / data.length;
}

/**
 * Mean of `data[start..end)`, without copying
 */
export function rangeMean(data: readonly number[], start: number, end: number): number {
  const from = Math.max(0, start);
  const to = Math.min(data.length, end);
  if (to <= from) return 0;

  let sum = 0;
  for (let i = from; i < to; i++) sum += data[i];
  return sum / (to - from);
}

/**
 * Calculate variance of an array
 * @param usePopulation If true, divide by n (population); if false, divide by n-1 (sample)
 */
export function variance(data: readonly number[], usePopulation: boolean = true): number {
  const n = data.length;
  if (n === 0 || (!usePopulation && n < 2)) return 0;

  const avg = mean(data);
  let sumSquaredDiff = 0;
  for (const value of data) {
    const diff = value - avg;
    sumSquaredDiff += diff * diff;
  }
  return sumSquaredDiff / (usePopulation ? n : n - 1);
}

/**
 * Calculate standard deviation of an array
 * @param usePopulation If true, use population formula; if false, use sample formula
 */
export function standardDeviation(data: readonly number[], usePopulation: boolean = true): number {
  return Math.sqrt(variance(data, usePopulation));
}

/**
 * Root mean square of successive differences
 */
export function rmssd(data: readonly number[]): number {
  if (data.length < 2) return 0;
  let sumSquaredDiff = 0;
  for (let i = 1; i < data.length; i++) {
    const diff = data[i] - data[i - 1];
    sumSquaredDiff += diff * diff;
  }
  return Math.sqrt(sumSquaredDiff / (data.length - 1));
}

/**
 * Index of the smallest value in `data[start..end]` (inclusive); first wins on ties
 */
export function argMin(data: readonly number[], start: number, end: number): number {
  let best = start;
  for (let i = start + 1; i <= end; i++) {
    if (data[i] < data[best]) best = i;
  }
  return best;
}

/**
 * Smallest value in `data[start..end)`, or `fallback` for an empty range
 */
export function rangeMin(
  data: readonly number[],
  start: number,
  end: number,
  fallback: number
): number {
  let result = fallback;
  let found = false;
  for (let i = Math.max(0, start); i < Math.min(data.length, end); i++) {
    if (!found || data[i] < result) {
      result = data[i];
      found = true;
    }
  }
  return result;
}
