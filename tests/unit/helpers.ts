import { Reading, Season } from '../../src/types/temperature';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const START = Date.UTC(2020, 0, 1);

/**
 * One reading per day for a single city, starting 2020-01-01
 */
export function makeSeries(temps: number[], city = 'Testville', season: Season = 'winter'): Reading[] {
  return temps.map((temperature, i) => ({
    city,
    timestamp: START + i * DAY_MS,
    season,
    temperature,
  }));
}

export function assertClose(actual: number | null, expected: number, tolerance = 1e-9): void {
  if (actual === null || Math.abs(actual - expected) > tolerance) {
    throw new Error(`Expected ${actual} to be within ${tolerance} of ${expected}`);
  }
}
