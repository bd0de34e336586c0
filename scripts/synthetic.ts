/**
 * Synthetic Temperature History
 *
 * Daily readings per city: seasonal normal (data/seasonal-normals.json)
 * plus Gaussian noise. Used by generate-dataset and benchmark.
 *
 * Season labels follow the northern meteorological calendar for every city,
 * including southern-hemisphere ones (Buenos Aires, Cape Town, Wellington),
 * whose normals are keyed to those labels: their "summer" is June - August.
 */

import fs from 'fs';
import path from 'path';
import { Type, Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { getCalendarSeason } from '../src/config/seasons';
import { Reading } from '../src/types/temperature';

const NORMALS_PATH = path.join(__dirname, '../data/seasonal-normals.json');

const DAY_MS = 24 * 60 * 60 * 1000;

// Day-to-day spread around the seasonal normal (°C)
const NOISE_STD = 5;

const SeasonNormalsSchema = Type.Record(
  Type.String(),
  Type.Object({
    winter: Type.Number(),
    spring: Type.Number(),
    summer: Type.Number(),
    autumn: Type.Number(),
  })
);

export type SeasonNormals = Static<typeof SeasonNormalsSchema>;

export function loadSeasonNormals(): SeasonNormals {
  const raw: unknown = JSON.parse(fs.readFileSync(NORMALS_PATH, 'utf8'));
  if (!Value.Check(SeasonNormalsSchema, raw)) {
    throw new Error(`Invalid seasonal normals file: ${NORMALS_PATH}`);
  }
  return raw;
}

/**
 * Standard normal sample (Box-Muller)
 */
function gaussian(): number {
  const u = 1 - Math.random();
  const v = Math.random();
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

export function generateReadings(params: {
  normals: SeasonNormals;
  startDate: Date;
  days: number;
  cities?: string[];
}): Reading[] {
  const { normals, startDate, days } = params;
  const cities = params.cities ?? Object.keys(normals);
  const readings: Reading[] = [];

  for (const city of cities) {
    const normal = normals[city];
    if (!normal) {
      throw new Error(`No seasonal normals for city: ${city}`);
    }

    for (let d = 0; d < days; d++) {
      const timestamp = startDate.getTime() + d * DAY_MS;
      const season = getCalendarSeason(new Date(timestamp));
      readings.push({
        city,
        timestamp,
        season,
        temperature: Math.round((normal[season] + gaussian() * NOISE_STD) * 100) / 100,
      });
    }
  }

  return readings;
}

/**
 * Serialize readings as CSV with an ISO date column
 */
export function toCsv(readings: Reading[]): string {
  const lines = ['city,timestamp,temperature,season'];
  for (const r of readings) {
    const city = r.city.includes(',') ? `"${r.city}"` : r.city;
    const date = new Date(r.timestamp).toISOString().split('T')[0];
    lines.push(`${city},${date},${r.temperature},${r.season}`);
  }
  return lines.join('\n') + '\n';
}
