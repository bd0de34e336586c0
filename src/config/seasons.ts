import { Season } from '../types/temperature';

/**
 * Season Catalog
 *
 * Order here is the display order for seasonal statistics.
 */
export const SEASONS: Season[] = ['winter', 'spring', 'summer', 'autumn'];

/**
 * Meteorological seasons for the northern hemisphere, indexed by UTC month (0 = January)
 */
const MONTH_TO_SEASON: Season[] = [
  'winter', 'winter',           // Jan, Feb
  'spring', 'spring', 'spring', // Mar - May
  'summer', 'summer', 'summer', // Jun - Aug
  'autumn', 'autumn', 'autumn', // Sep - Nov
  'winter',                     // Dec
];

/**
 * Check whether a string is a known season (case-sensitive)
 */
export function isSeason(value: string): value is Season {
  return SEASONS.some((season) => season === value);
}

/**
 * Get the calendar season for a date
 */
export function getCalendarSeason(date: Date): Season {
  return MONTH_TO_SEASON[date.getUTCMonth()];
}
