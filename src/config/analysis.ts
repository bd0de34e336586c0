/**
 * Analysis Configuration
 *
 * Defaults for the rolling baseline and the anomaly / live-range thresholds.
 */

/** Trailing window size (readings) for rolling statistics */
export const DEFAULT_WINDOW = 30;

/** Multiple of the standard deviation beyond which a reading is anomalous */
export const ANOMALY_THRESHOLD_SIGMA = 2;
