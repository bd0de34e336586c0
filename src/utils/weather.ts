/**
 * OpenWeatherMap Client
 *
 * Fetches the current temperature for a city. Transport and API failures are
 * returned as { ok: false, code, message }, never thrown.
 */

import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { OPENWEATHER_BASE_URL, OPENWEATHER_TIMEOUT_MS } from '../config/openweather';
import { LiveReadingResult } from '../types/live';

// Only the part of the current-weather response we read
const CurrentWeatherSchema = Type.Object({
  main: Type.Object({
    temp: Type.Number(),
  }),
});

export async function fetchCurrentTemperature(
  city: string,
  apiKey: string,
  options: { baseUrl?: string; timeoutMs?: number } = {}
): Promise<LiveReadingResult> {
  const { baseUrl = OPENWEATHER_BASE_URL, timeoutMs = OPENWEATHER_TIMEOUT_MS } = options;

  const url = new URL(`${baseUrl}/weather`);
  url.searchParams.set('q', city);
  url.searchParams.set('appid', apiKey);
  url.searchParams.set('units', 'metric');

  let res: Response;
  try {
    res = await fetch(url.toString(), { signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    return {
      ok: false,
      code: 'NETWORK_ERROR',
      message: `Weather API unreachable: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  if (res.status === 401) {
    return {
      ok: false,
      code: 401,
      message: 'Invalid API key. Please see https://openweathermap.org/faq#error401 for more info.',
    };
  }

  if (!res.ok) {
    return { ok: false, code: res.status, message: `Weather API error: ${res.status} ${res.statusText}` };
  }

  let data: unknown;
  try {
    data = await res.json();
  } catch {
    return { ok: false, code: 'MALFORMED_RESPONSE', message: 'Weather API returned invalid JSON' };
  }

  if (!Value.Check(CurrentWeatherSchema, data)) {
    return { ok: false, code: 'MALFORMED_RESPONSE', message: 'Weather API response has no main.temp' };
  }

  return { ok: true, temperature: data.main.temp };
}
