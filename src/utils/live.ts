/**
 * Live Reading Evaluation
 *
 * Compares a freshly fetched temperature with the historical range
 * (mean ± k * std) of the city's current season.
 */

import { ANOMALY_THRESHOLD_SIGMA } from '../config/analysis';
import { getCalendarSeason } from '../config/seasons';
import { LiveAssessment, LiveReadingResult, SeasonRule } from '../types/live';
import { Reading, Season, SeasonalStat } from '../types/temperature';
import { assertThreshold, EmptySeriesError, UnavailableLiveReadingError } from './errors';

/**
 * Range test, inclusive on both bounds
 */
export function evaluateLive(
  reading: number,
  stat: SeasonalStat,
  k: number = ANOMALY_THRESHOLD_SIGMA
): LiveAssessment {
  assertThreshold(k);

  const lowerBound = stat.mean - k * stat.std;
  const upperBound = stat.mean + k * stat.std;

  return {
    temperature: reading,
    lower_bound: lowerBound,
    upper_bound: upperBound,
    in_range: lowerBound <= reading && reading <= upperBound,
  };
}

/**
 * Unwrap a live reading, or fail with the upstream code and message
 */
export function requireLiveTemperature(result: LiveReadingResult): number {
  if (!result.ok) {
    throw new UnavailableLiveReadingError(result.code, result.message);
  }
  return result.temperature;
}

/**
 * Pick the season a live reading should be compared against
 */
export function resolveCurrentSeason(city: string, series: Reading[], rule: SeasonRule): Season {
  if (rule.source === 'calendar') {
    return getCalendarSeason(rule.date);
  }

  if (series.length === 0) {
    throw new EmptySeriesError(city);
  }

  // Most recent by timestamp; the first one wins on ties
  let latest = series[0];
  for (const reading of series) {
    if (reading.timestamp > latest.timestamp) {
      latest = reading;
    }
  }
  return latest.season;
}
