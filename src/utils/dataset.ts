/**
 * Dataset Ingestion
 *
 * Parses uploaded CSV text into readings. Malformed rows are rejected here,
 * with a reason, so the analysis functions only ever see clean data.
 */

import { isSeason } from '../config/seasons';
import { CsvParseResult } from '../types/dataset';
import { Reading } from '../types/temperature';
import { InvalidDatasetError } from './errors';

const REQUIRED_COLUMNS = ['city', 'timestamp', 'temperature', 'season'] as const;

type Column = (typeof REQUIRED_COLUMNS)[number];

/**
 * Split one CSV line into trimmed fields.
 * Supports double-quoted fields with embedded commas and "" escapes.
 */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];

    if (inQuotes) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      fields.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }

  fields.push(current.trim());
  return fields;
}

/**
 * Parse a timestamp cell into Unix epoch milliseconds.
 *
 * Accepts integer epoch ms (10+ digits) or anything Date understands. Shorter
 * digit strings ("2010", "20100101") are rejected rather than read as 1970. Date-times without a
 * zone designator ("2010-01-01 00:00:00") are read as UTC.
 */
export function parseTimestamp(value: string): number | null {
  if (/^-?\d+$/.test(value)) {
    return /^-?\d{10,}$/.test(value) ? parseInt(value, 10) : null;
  }

  let normalized = value;
  const zoneless = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}(:\d{2}(\.\d+)?)?)$/.exec(value);
  if (zoneless) {
    normalized = `${zoneless[1]}T${zoneless[2]}Z`;
  }

  const ms = Date.parse(normalized);
  return Number.isNaN(ms) ? null : ms;
}

/**
 * Validate a single row against the header layout
 */
function parseRow(
  fields: string[],
  columns: Record<Column, number>
): { reading: Reading } | { reason: string } {
  const city = fields[columns.city] ?? '';
  const rawTimestamp = fields[columns.timestamp] ?? '';
  const rawTemperature = fields[columns.temperature] ?? '';
  const rawSeason = (fields[columns.season] ?? '').toLowerCase();

  if (!city) {
    return { reason: 'Missing city' };
  }

  const timestamp = parseTimestamp(rawTimestamp);
  if (timestamp === null) {
    return { reason: `Invalid timestamp "${rawTimestamp}"` };
  }

  const temperature = rawTemperature === '' ? NaN : Number(rawTemperature);
  if (!Number.isFinite(temperature)) {
    return { reason: `Invalid temperature "${rawTemperature}"` };
  }

  if (!isSeason(rawSeason)) {
    return { reason: `Unknown season "${rawSeason}"` };
  }

  return { reading: { city, timestamp, season: rawSeason, temperature } };
}

/**
 * Parse CSV text with a header row containing at least
 * city, timestamp, temperature and season (any order)
 */
export function parseTemperatureCsv(text: string): CsvParseResult {
  const lines = text.split(/\r?\n/);
  const headerIndex = lines.findIndex((l) => l.trim() !== '');
  if (headerIndex === -1) {
    throw new InvalidDatasetError('Dataset is empty');
  }

  const header = splitCsvLine(lines[headerIndex]).map((h) => h.toLowerCase());
  const missing = REQUIRED_COLUMNS.filter((c) => !header.includes(c));
  if (missing.length > 0) {
    throw new InvalidDatasetError(`Missing required column(s): ${missing.join(', ')}`);
  }

  const columns = {
    city: header.indexOf('city'),
    timestamp: header.indexOf('timestamp'),
    temperature: header.indexOf('temperature'),
    season: header.indexOf('season'),
  };

  const result: CsvParseResult = { readings: [], failed: [] };

  for (let i = headerIndex + 1; i < lines.length; i++) {
    if (lines[i].trim() === '') continue;

    const parsed = parseRow(splitCsvLine(lines[i]), columns);
    if ('reading' in parsed) {
      result.readings.push(parsed.reading);
    } else {
      result.failed.push({ line: i + 1, reason: parsed.reason });
    }
  }

  return result;
}

/**
 * Split readings into per-city series ordered by timestamp.
 * Readings with equal timestamps keep their input order.
 */
export function groupByCity(readings: Reading[]): Map<string, Reading[]> {
  const series = new Map<string, Reading[]>();
  for (const reading of readings) {
    const list = series.get(reading.city);
    if (list) {
      list.push(reading);
    } else {
      series.set(reading.city, [reading]);
    }
  }

  for (const list of series.values()) {
    list.sort((a, b) => a.timestamp - b.timestamp);
  }
  return series;
}

/**
 * Series for a single city, ordered by timestamp (empty if the city is absent)
 */
export function getCitySeries(readings: Reading[], city: string): Reading[] {
  return readings.filter((r) => r.city === city).sort((a, b) => a.timestamp - b.timestamp);
}

/**
 * Distinct cities in first-seen order
 */
export function listCities(readings: Reading[]): string[] {
  return [...new Set(readings.map((r) => r.city))];
}
