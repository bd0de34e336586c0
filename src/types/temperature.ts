/**
 * Temperature Analysis Types
 *
 * Readings come from an uploaded historical dataset; everything else here is
 * derived from them on demand and never stored.
 */

export type Season = 'winter' | 'spring' | 'summer' | 'autumn';

export interface Reading {
  city: string;
  /** Unix epoch milliseconds */
  timestamp: number;
  season: Season;
  /** Degrees Celsius */
  temperature: number;
}

/**
 * Rolling statistics at one position of a series.
 * Both are null until the window has filled.
 */
export interface RollingStat {
  moving_mean: number | null;
  moving_std: number | null;
}

export interface BaselinePoint extends Reading, RollingStat {
  is_anomaly: boolean;
}

export interface AnalysisOptions {
  /** Trailing window size (default: 30) */
  window?: number;
  /** Sigma multiple for anomaly classification (default: 2) */
  k?: number;
}

export interface AnalysisSummary {
  reading_count: number;
  /** Points with a defined rolling baseline */
  baseline_count: number;
  anomaly_count: number;
}

export interface SeasonalStat {
  city: string;
  season: Season;
  mean: number;
  /** Sample standard deviation; 0 for single-reading groups */
  std: number;
  sample_count: number;
}

/** Keyed by seasonKey(city, season) */
export type SeasonalStatMap = Map<string, SeasonalStat>;
