import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { analyzeAllCities, analyzeSeries, classify, summarizeAnalysis } from '../../src/utils/anomaly';
import { InvalidThresholdError } from '../../src/utils/errors';
import { RollingStat } from '../../src/types/temperature';
import { DAY_MS, START, makeSeries } from './helpers';

function flat(mean: number, std: number, length: number): RollingStat[] {
  return Array.from({ length }, () => ({ moving_mean: mean, moving_std: std }));
}

describe('classify', () => {
  it('flags any deviation when the baseline has zero spread', () => {
    const series = makeSeries([30]);
    assert.deepEqual(classify(series, flat(10, 0, 1)), [true]);
  });

  it('does not flag readings exactly on mean ± k * std', () => {
    const series = makeSeries([14, 6, 14.5, 5.5, 10]);
    assert.deepEqual(classify(series, flat(10, 2, 5), 2), [false, false, true, true, false]);
  });

  it('never flags points without a baseline', () => {
    const series = makeSeries([1000, -1000]);
    const baseline: RollingStat[] = [
      { moving_mean: null, moving_std: null },
      { moving_mean: null, moving_std: null },
    ];
    assert.deepEqual(classify(series, baseline), [false, false]);
  });

  it('treats k = 0 as "any deviation from the mean"', () => {
    const series = makeSeries([10, 10.1, 9.9]);
    assert.deepEqual(classify(series, flat(10, 2, 3), 0), [false, true, true]);
  });

  it('rejects negative or non-finite thresholds', () => {
    const series = makeSeries([10]);
    assert.throws(() => classify(series, flat(10, 1, 1), -1), InvalidThresholdError);
    assert.throws(() => classify(series, flat(10, 1, 1), NaN), InvalidThresholdError);
    assert.throws(() => classify(series, flat(10, 1, 1), Infinity), InvalidThresholdError);
  });

  it('requires a baseline aligned with the series', () => {
    assert.throws(
      () => classify(makeSeries([1, 2]), flat(1, 1, 1)),
      /Baseline length 1 does not match series length 2/
    );
  });
});

describe('analyzeSeries', () => {
  it('flags a spike that clears its own window', () => {
    // window of 6: mean 13.33, std 8.165, upper bound 29.66
    const points = analyzeSeries(makeSeries([10, 10, 10, 10, 10, 30]), { window: 6 });

    assert.deepEqual(
      points.map((p) => p.is_anomaly),
      [false, false, false, false, false, true]
    );
    assert.equal(points[4].moving_mean, null);
  });

  it('does not flag the same spike inside a 5-reading window', () => {
    // [10, 10, 10, 10, 30]: mean 14, std sqrt(80), upper bound 31.9
    const points = analyzeSeries(makeSeries([10, 10, 10, 10, 10, 30]), { window: 5 });
    assert.equal(points.some((p) => p.is_anomaly), false);
  });

  it('keeps the reading fields on every point', () => {
    const series = makeSeries([5, 7], 'Lisbon', 'summer');
    const points = analyzeSeries(series, { window: 2 });

    assert.deepEqual(points[0], {
      ...series[0],
      moving_mean: null,
      moving_std: null,
      is_anomaly: false,
    });
    assert.equal(points[1].moving_mean, 6);
    assert.equal(points[1].city, 'Lisbon');
    assert.equal(points[1].season, 'summer');
  });
});

describe('summarizeAnalysis', () => {
  it('counts readings, baselines and anomalies', () => {
    const points = analyzeSeries(makeSeries([10, 10, 10, 10, 10, 30]), { window: 6 });
    assert.deepEqual(summarizeAnalysis(points), {
      reading_count: 6,
      baseline_count: 1,
      anomaly_count: 1,
    });
  });
});

describe('analyzeAllCities', () => {
  it('analyzes each city on its own series in timestamp order', () => {
    const readings = [
      { city: 'B', timestamp: START + 2 * DAY_MS, season: 'winter' as const, temperature: 3 },
      { city: 'A', timestamp: START + DAY_MS, season: 'winter' as const, temperature: 20 },
      { city: 'B', timestamp: START, season: 'winter' as const, temperature: 1 },
      { city: 'A', timestamp: START, season: 'winter' as const, temperature: 10 },
      { city: 'B', timestamp: START + DAY_MS, season: 'winter' as const, temperature: 2 },
    ];

    const results = analyzeAllCities(readings, { window: 2 });

    assert.deepEqual([...results.keys()], ['B', 'A']);

    const b = results.get('B') ?? [];
    assert.deepEqual(b.map((p) => p.temperature), [1, 2, 3]);
    assert.deepEqual(b.map((p) => p.moving_mean), [null, 1.5, 2.5]);

    const a = results.get('A') ?? [];
    assert.deepEqual(a.map((p) => p.moving_mean), [null, 15]);
  });
});
