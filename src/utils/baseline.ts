/**
 * Rolling Baseline
 *
 * Trailing-window mean and sample standard deviation for one city's series.
 */

import { DEFAULT_WINDOW } from '../config/analysis';
import { Reading, RollingStat } from '../types/temperature';
import { InvalidWindowError } from './errors';
import { mean, sampleStd } from './stats';

/**
 * Compute rolling statistics for a series ordered by timestamp.
 *
 * Position i gets the stats of temperatures [i - window + 1 .. i]; the first
 * window - 1 positions have none. An empty series yields an empty result.
 */
export function computeBaseline(series: Reading[], window: number = DEFAULT_WINDOW): RollingStat[] {
  if (!Number.isInteger(window) || window < 1) {
    throw new InvalidWindowError(window);
  }

  const temps = series.map((r) => r.temperature);

  return temps.map((_, i) => {
    if (i < window - 1) {
      return { moving_mean: null, moving_std: null };
    }

    const slice = temps.slice(i - window + 1, i + 1);
    const avg = mean(slice);
    return { moving_mean: avg, moving_std: sampleStd(slice, avg) };
  });
}
