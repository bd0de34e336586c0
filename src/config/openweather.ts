/**
 * OpenWeatherMap Configuration
 *
 * The API key may also be supplied per request via the X-Weather-Api-Key header.
 */

export const OPENWEATHER_BASE_URL =
  process.env.OPENWEATHER_BASE_URL || 'https://api.openweathermap.org/data/2.5';

export const OPENWEATHER_API_KEY = process.env.OPENWEATHER_API_KEY || '';

export const OPENWEATHER_TIMEOUT_MS = parseInt(process.env.OPENWEATHER_TIMEOUT_MS || '5000', 10);
