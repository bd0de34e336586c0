/**
 * Generate a Synthetic Temperature Dataset
 *
 * Writes daily readings for every city in data/seasonal-normals.json.
 *
 * Run: npm run generate -- [output.csv] [years]
 */

import fs from 'fs';
import { generateReadings, loadSeasonNormals, toCsv } from './synthetic';

const DEFAULT_OUTPUT = 'temperature_data.csv';
const DEFAULT_YEARS = 10;
const START_DATE = new Date('2010-01-01T00:00:00Z');

function main() {
  const output = process.argv[2] || DEFAULT_OUTPUT;
  const years = parseInt(process.argv[3] || String(DEFAULT_YEARS), 10);

  if (!Number.isInteger(years) || years < 1) {
    console.error(`Invalid number of years: ${process.argv[3]}`);
    process.exit(1);
  }

  const normals = loadSeasonNormals();
  const readings = generateReadings({ normals, startDate: START_DATE, days: years * 365 });

  fs.writeFileSync(output, toCsv(readings));

  console.log(`Wrote ${readings.length} readings for ${Object.keys(normals).length} cities to ${output}`);
}

main();
