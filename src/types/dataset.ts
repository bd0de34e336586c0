/**
 * Dataset Types
 */

import { Reading } from './temperature';

export interface CsvParseResult {
  readings: Reading[];
  /** Rejected rows, 1-based line numbers */
  failed: Array<{
    line: number;
    reason: string;
  }>;
}

export interface DatasetRecord {
  id: string;
  /** Unix epoch milliseconds */
  created_at: number;
  readings: Reading[];
  /** Distinct cities in first-seen order */
  cities: string[];
}
