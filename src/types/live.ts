/**
 * Live Temperature Types
 */

import { Season, SeasonalStat } from './temperature';

export interface LiveReadingFailure {
  ok: false;
  /** HTTP status from the weather API, or a client-side failure code */
  code: number | string;
  message: string;
}

export type LiveReadingResult = { ok: true; temperature: number } | LiveReadingFailure;

/** Fetches the current temperature for a city (see utils/weather) */
export type LiveTemperatureFetcher = (city: string, apiKey: string) => Promise<LiveReadingResult>;

export interface LiveAssessment {
  temperature: number;
  lower_bound: number;
  upper_bound: number;
  in_range: boolean;
}

/**
 * How the "current" season is chosen for a live comparison:
 * - latest: season of the city's most recent historical reading
 * - calendar: season of the given date
 */
export type SeasonRule = { source: 'latest' } | { source: 'calendar'; date: Date };

export interface LiveCheckResult {
  city: string;
  season: Season;
  stat: SeasonalStat;
  assessment: LiveAssessment;
}
