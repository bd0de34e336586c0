import { CsvParseResult } from '../types/dataset';
import { SeasonRule } from '../types/live';

export interface ValidationResult {
  valid: boolean;
  reason?: string;
}

/**
 * Validate a parsed upload beyond schema validation
 */
export function validateDatasetUpload(result: CsvParseResult): ValidationResult {
  if (result.readings.length === 0) {
    return {
      valid: false,
      reason:
        result.failed.length > 0
          ? `No valid rows (${result.failed.length} rejected)`
          : 'Dataset has a header but no rows',
    };
  }

  return { valid: true };
}

/**
 * Choose the weather API key: request header first, then server config.
 * Returns null when neither is set.
 */
export function resolveWeatherApiKey(
  header: string | string[] | undefined,
  configured: string
): string | null {
  const fromHeader = Array.isArray(header) ? header[0] : header;
  if (fromHeader && fromHeader.trim() !== '') {
    return fromHeader.trim();
  }
  return configured !== '' ? configured : null;
}

/**
 * Map the season_source query param to a season rule
 */
export function toSeasonRule(source: 'latest' | 'calendar', now: Date): SeasonRule {
  return source === 'calendar' ? { source: 'calendar', date: now } : { source: 'latest' };
}
