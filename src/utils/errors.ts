/**
 * Analysis Errors
 *
 * Every recoverable failure in the analysis path is one of these, so callers
 * can branch on `code` instead of parsing messages.
 */

export type AnalysisErrorCode =
  | 'INVALID_WINDOW'
  | 'INVALID_THRESHOLD'
  | 'EMPTY_SERIES'
  | 'MISSING_SEASONAL_STAT'
  | 'UNAVAILABLE_LIVE_READING'
  | 'INVALID_DATASET';

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;

  constructor(code: AnalysisErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidWindowError extends AnalysisError {
  constructor(window: number) {
    super('INVALID_WINDOW', `Window must be a positive integer, got ${window}`);
  }
}

export class InvalidThresholdError extends AnalysisError {
  constructor(k: number) {
    super('INVALID_THRESHOLD', `Threshold must be a finite number >= 0, got ${k}`);
  }
}

export class EmptySeriesError extends AnalysisError {
  constructor(city: string) {
    super('EMPTY_SERIES', `No readings for city: ${city}`);
  }
}

export class MissingSeasonalStatError extends AnalysisError {
  constructor(
    readonly city: string,
    readonly season: string
  ) {
    super('MISSING_SEASONAL_STAT', `No seasonal statistics for ${city} in ${season}`);
  }
}

export class UnavailableLiveReadingError extends AnalysisError {
  constructor(
    readonly upstreamCode: number | string,
    upstreamMessage: string
  ) {
    super('UNAVAILABLE_LIVE_READING', upstreamMessage);
  }
}

export class InvalidDatasetError extends AnalysisError {
  constructor(message: string) {
    super('INVALID_DATASET', message);
  }
}

/**
 * Validate a sigma multiple (k >= 0, finite)
 */
export function assertThreshold(k: number): void {
  if (!Number.isFinite(k) || k < 0) {
    throw new InvalidThresholdError(k);
  }
}
