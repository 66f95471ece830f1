import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { CorrelationProvider } from '../types/ecmo';
import {
  MIN_CORRELATION_PAIRS,
  completePairs,
  correlate,
  correlationPairsFor,
} from '../lib/correlation';
import { getSchemaVersion } from '../lib/schema/columns';
import { record } from './helpers';

function recordingProvider() {
  const calls: { xs: number[]; ys: number[] }[] = [];
  const provider: CorrelationProvider = (xs, ys) => {
    calls.push({ xs: [...xs], ys: [...ys] });
    return { pearsonR: 0.5, pearsonP: 0.2, spearmanRho: 0.4, spearmanP: 0.3 };
  };
  return { calls, provider };
}

const rows = [
  record({ hemoglobin: 10, r: 8 }),
  record({ hemoglobin: null, r: 9 }),
  record({ hemoglobin: 11, r: null }),
  record({ hemoglobin: 12, r: 7 }),
  record({ hemoglobin: 9, r: 10 }),
];

describe('completePairs', () => {
  it('drops rows missing either value and keeps table order', () => {
    assert.deepEqual(completePairs(rows, 'hemoglobin', 'r'), [
      [10, 8],
      [12, 7],
      [9, 10],
    ]);
  });
});

describe('correlate', () => {
  it('passes the paired values to the provider', () => {
    const { calls, provider } = recordingProvider();
    const result = correlate(rows, 'hemoglobin', 'r', provider);
    assert.deepEqual(calls, [{ xs: [10, 12, 9], ys: [8, 7, 10] }]);
    assert.deepEqual(result, {
      status: 'ok',
      value: {
        x: 'hemoglobin',
        y: 'r',
        n: 3,
        statistics: { pearsonR: 0.5, pearsonP: 0.2, spearmanRho: 0.4, spearmanP: 0.3 },
      },
    });
  });

  it('reports insufficient data below three pairs without calling the provider', () => {
    const { calls, provider } = recordingProvider();
    const result = correlate(rows.slice(0, 4), 'hemoglobin', 'r', provider);
    assert.equal(calls.length, 0);
    assert.deepEqual(result, {
      status: 'insufficient-data',
      required: MIN_CORRELATION_PAIRS,
      available: 2,
      message: 'Need at least 3 rows with both Hemoglobin and R (ΔP/Flow) (have 2)',
    });
  });
});

describe('correlationPairsFor', () => {
  it('offers only pairs the schema version carries', () => {
    const pairsOf = (id: 'v1' | 'v2' | 'v3') => correlationPairsFor(getSchemaVersion(id)).map(p => `${p.x}/${p.y}`);
    assert.deepEqual(pairsOf('v1'), ['hemoglobin/r', 'flow/deltaP', 'rpm/flow']);
    assert.deepEqual(pairsOf('v2'), ['hemoglobin/r', 'flow/deltaP', 'rpm/flow', 'hemoglobin/rPerHb']);
    assert.equal(pairsOf('v3').length, 5);
  });
});
