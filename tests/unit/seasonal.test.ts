import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { MissingSeasonalStatError } from '../../src/utils/errors';
import {
  aggregateSeasons,
  getSeasonalStat,
  listSeasonalStats,
  seasonKey,
} from '../../src/utils/seasonal';
import { Reading } from '../../src/types/temperature';
import { assertClose, makeSeries } from './helpers';

const readings: Reading[] = [
  ...makeSeries([20, 22, 24], 'Athens', 'summer'),
  ...makeSeries([1, 3], 'Athens', 'winter'),
  ...makeSeries([5], 'Bergen', 'winter'),
];

describe('aggregateSeasons', () => {
  it('produces one stat per distinct (city, season) pair', () => {
    const stats = aggregateSeasons(readings);

    assert.deepEqual(
      [...stats.keys()].sort(),
      [seasonKey('Athens', 'summer'), seasonKey('Athens', 'winter'), seasonKey('Bergen', 'winter')].sort()
    );
  });

  it('computes mean and sample std per group', () => {
    const stats = aggregateSeasons(readings);

    assert.deepEqual(stats.get(seasonKey('Athens', 'summer')), {
      city: 'Athens',
      season: 'summer',
      mean: 22,
      std: 2,
      sample_count: 3,
    });

    const winter = getSeasonalStat(stats, 'Athens', 'winter');
    assert.equal(winter.mean, 2);
    assertClose(winter.std, Math.SQRT2);
  });

  it('gives single-reading groups a std of 0', () => {
    const stat = getSeasonalStat(aggregateSeasons(readings), 'Bergen', 'winter');
    assert.deepEqual(stat, { city: 'Bergen', season: 'winter', mean: 5, std: 0, sample_count: 1 });
  });

  it('matches the arithmetic mean of each group', () => {
    const mixed: Reading[] = [
      ...makeSeries([0.1, 0.2, 0.3, 0.4], 'Oslo', 'spring'),
      ...makeSeries([-7.5, -2.25, 3.125], 'Oslo', 'autumn'),
    ];
    const stats = aggregateSeasons(mixed);

    assertClose(getSeasonalStat(stats, 'Oslo', 'spring').mean, 0.25);
    assertClose(getSeasonalStat(stats, 'Oslo', 'autumn').mean, -6.625 / 3);
  });

  it('uses the whole dataset, not a single city', () => {
    const stats = aggregateSeasons(readings);
    assert.equal(getSeasonalStat(stats, 'Bergen', 'winter').sample_count, 1);
    assert.equal(getSeasonalStat(stats, 'Athens', 'winter').sample_count, 2);
  });

  it('returns a fresh mapping on every call', () => {
    assert.notEqual(aggregateSeasons(readings), aggregateSeasons(readings));
  });

  it('returns an empty mapping for no readings', () => {
    assert.equal(aggregateSeasons([]).size, 0);
  });
});

describe('getSeasonalStat', () => {
  it('fails with MISSING_SEASONAL_STAT for an absent pair', () => {
    const stats = aggregateSeasons(readings);

    assert.throws(
      () => getSeasonalStat(stats, 'Bergen', 'summer'),
      (err: unknown) =>
        err instanceof MissingSeasonalStatError &&
        err.code === 'MISSING_SEASONAL_STAT' &&
        err.city === 'Bergen' &&
        err.season === 'summer'
    );
  });
});

describe('listSeasonalStats', () => {
  it('sorts by city, then by season in catalog order', () => {
    const list = listSeasonalStats(aggregateSeasons(readings));
    assert.deepEqual(
      list.map((s) => `${s.city}/${s.season}`),
      ['Athens/winter', 'Athens/summer', 'Bergen/winter']
    );
  });
});
