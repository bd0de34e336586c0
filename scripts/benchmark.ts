/**
 * Sequential Analysis Benchmark
 *
 * Times the per-city rolling analysis and the seasonal aggregation over
 * synthetic datasets of increasing size. Any parallel per-city path should
 * beat these numbers at the target size before it is enabled.
 *
 * Run: npm run benchmark
 */

import { DEFAULT_WINDOW } from '../src/config/analysis';
import { analyzeAllCities } from '../src/utils/anomaly';
import { aggregateSeasons } from '../src/utils/seasonal';
import { generateReadings, loadSeasonNormals } from './synthetic';

const YEAR_STEPS = [1, 5, 10, 20];
const RUNS = 5;
const START_DATE = new Date('2010-01-01T00:00:00Z');

function time(fn: () => void): number {
  const started = performance.now();
  fn();
  return performance.now() - started;
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)];
}

function main() {
  const normals = loadSeasonNormals();
  const cityCount = Object.keys(normals).length;

  console.log('\n========================================');
  console.log(`  SEQUENTIAL ANALYSIS (window=${DEFAULT_WINDOW}, ${cityCount} cities)`);
  console.log('========================================\n');

  for (const years of YEAR_STEPS) {
    const readings = generateReadings({ normals, startDate: START_DATE, days: years * 365 });

    const rolling: number[] = [];
    const seasonal: number[] = [];
    for (let i = 0; i < RUNS; i++) {
      rolling.push(time(() => analyzeAllCities(readings)));
      seasonal.push(time(() => aggregateSeasons(readings)));
    }

    console.log(
      `${String(years).padStart(2)}y  ${String(readings.length).padStart(7)} readings  ` +
        `rolling ${median(rolling).toFixed(1)} ms  seasonal ${median(seasonal).toFixed(1)} ms`
    );
  }

  console.log('');
}

main();
