/**
 * Seasonal Baselines
 *
 * Climatological mean / std per (city, season) across the full dataset,
 * independent of the rolling window.
 */

import { SEASONS } from '../config/seasons';
import { Reading, Season, SeasonalStat, SeasonalStatMap } from '../types/temperature';
import { MissingSeasonalStatError } from './errors';
import { mean, sampleStd } from './stats';

/**
 * Build map key for a (city, season) pair
 */
export function seasonKey(city: string, season: Season): string {
  return `${city}:${season}`;
}

/**
 * Aggregate temperatures by (city, season).
 * Groups with a single reading get std = 0.
 */
export function aggregateSeasons(readings: Reading[]): SeasonalStatMap {
  const groups = new Map<string, { city: string; season: Season; temps: number[] }>();

  for (const reading of readings) {
    const key = seasonKey(reading.city, reading.season);
    const group = groups.get(key);
    if (group) {
      group.temps.push(reading.temperature);
    } else {
      groups.set(key, { city: reading.city, season: reading.season, temps: [reading.temperature] });
    }
  }

  const stats: SeasonalStatMap = new Map();
  for (const [key, { city, season, temps }] of groups) {
    const avg = mean(temps);
    stats.set(key, {
      city,
      season,
      mean: avg,
      std: sampleStd(temps, avg),
      sample_count: temps.length,
    });
  }

  return stats;
}

/**
 * Look up the stat for a (city, season) pair
 * Throws MissingSeasonalStatError if the dataset has no readings for it
 */
export function getSeasonalStat(stats: SeasonalStatMap, city: string, season: Season): SeasonalStat {
  const stat = stats.get(seasonKey(city, season));
  if (!stat) {
    throw new MissingSeasonalStatError(city, season);
  }
  return stat;
}

/**
 * Sorted by city, then season in catalog order
 */
export function listSeasonalStats(stats: SeasonalStatMap): SeasonalStat[] {
  return [...stats.values()].sort((a, b) => {
    if (a.city !== b.city) {
      return a.city < b.city ? -1 : 1;
    }
    return SEASONS.indexOf(a.season) - SEASONS.indexOf(b.season);
  });
}
