import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildDailySummary } from '../lib/metrics/daily-summary';
import { getSchemaVersion } from '../lib/schema/columns';
import { makeStore, reading } from './helpers';

const v2 = getSchemaVersion('v2');
const computedAt = '2024-01-02T12:00:00.000Z';

describe('buildDailySummary', () => {
  it('compares the first record of the latest day with the day before', () => {
    const store = makeStore('v2');
    store.add(reading('2024-01-01 09:00', { flow: 4, deltaP: 40, hemoglobin: 8 }));
    store.add(reading('2024-01-01 15:00', { flow: 6, deltaP: 30, hemoglobin: 9 }));
    store.add(reading('2024-01-02 08:00', { flow: 5, deltaP: 50, hemoglobin: 10 }));

    const summary = buildDailySummary(store.snapshot(), v2, computedAt);
    assert.equal(summary.dayIndex, 2);
    assert.equal(summary.recordCount, 3);
    assert.equal(summary.latestDay, '2024-01-02');
    assert.deepEqual(
      summary.metrics.map(m => m.metricId),
      ['Flow', 'RPM', 'DeltaP', 'Hb', 'R', 'R_per_Hb', 'RPM_per_Flow'],
    );

    const byId = new Map(summary.metrics.map(m => [m.metricId, m]));
    assert.deepEqual(byId.get('Flow'), {
      metricId: 'Flow',
      label: 'Flow',
      value: 5,
      unit: 'L/min',
      nullSemantics: 'Null when not recorded on that day.',
      previous: 4,
      changePct: 25,
      computedAt,
    });
    assert.equal(byId.get('Hb')?.changePct, 25);
    assert.equal(byId.get('R')?.value, 10);
    assert.equal(byId.get('R')?.changePct, 0);
    assert.equal(byId.get('R')?.unit, 'ratio');
    assert.equal(byId.get('R')?.nullSemantics, 'Null when Flow <= 0 or either input is missing.');
  });

  it('has no previous values on the first day', () => {
    const store = makeStore('v2');
    store.add(reading('2024-01-01 09:00'));
    const summary = buildDailySummary(store.snapshot(), v2, computedAt);
    assert.equal(summary.dayIndex, 1);
    assert.ok(summary.metrics.every(m => m.previous === null && m.changePct === null));
  });

  it('summarizes an empty table as nulls', () => {
    const summary = buildDailySummary([], v2, computedAt);
    assert.equal(summary.dayIndex, null);
    assert.equal(summary.latestDay, null);
    assert.equal(summary.metrics.length, 7);
    assert.ok(summary.metrics.every(m => m.value === null));
  });
});
