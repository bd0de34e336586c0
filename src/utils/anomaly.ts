import { ANOMALY_THRESHOLD_SIGMA, DEFAULT_WINDOW } from '../config/analysis';
import {
  AnalysisOptions,
  AnalysisSummary,
  BaselinePoint,
  Reading,
  RollingStat,
} from '../types/temperature';
import { computeBaseline } from './baseline';
import { groupByCity } from './dataset';
import { assertThreshold } from './errors';

/**
 * Classify each reading against its rolling baseline
 *
 * A reading is anomalous if it lies strictly outside mean ± k * std.
 * Positions without a baseline are never anomalous.
 */
export function classify(
  series: Reading[],
  baseline: RollingStat[],
  k: number = ANOMALY_THRESHOLD_SIGMA
): boolean[] {
  assertThreshold(k);
  if (series.length !== baseline.length) {
    throw new Error(`Baseline length ${baseline.length} does not match series length ${series.length}`);
  }

  return series.map((reading, i) => {
    const { moving_mean, moving_std } = baseline[i];
    if (moving_mean === null || moving_std === null) {
      return false;
    }
    return (
      reading.temperature > moving_mean + k * moving_std ||
      reading.temperature < moving_mean - k * moving_std
    );
  });
}

/**
 * Rolling baseline + classification for one city's series
 */
export function analyzeSeries(series: Reading[], options: AnalysisOptions = {}): BaselinePoint[] {
  const { window = DEFAULT_WINDOW, k = ANOMALY_THRESHOLD_SIGMA } = options;

  const baseline = computeBaseline(series, window);
  const flags = classify(series, baseline, k);

  return series.map((reading, i) => ({
    ...reading,
    ...baseline[i],
    is_anomaly: flags[i],
  }));
}

export function summarizeAnalysis(points: BaselinePoint[]): AnalysisSummary {
  return {
    reading_count: points.length,
    baseline_count: points.filter((p) => p.moving_mean !== null).length,
    anomaly_count: points.filter((p) => p.is_anomaly).length,
  };
}

/**
 * Analyze every city in a dataset, one after another.
 *
 * Per-city series are small; see scripts/benchmark.ts before reaching for workers.
 */
export function analyzeAllCities(
  readings: Reading[],
  options: AnalysisOptions = {}
): Map<string, BaselinePoint[]> {
  const results = new Map<string, BaselinePoint[]>();
  for (const [city, series] of groupByCity(readings)) {
    results.set(city, analyzeSeries(series, options));
  }
  return results;
}
