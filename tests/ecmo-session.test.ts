import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { AddRecordForm, CorrelationProvider } from '../types/ecmo';
import type { EcmoConfig } from '../lib/ecmo-config';
import { EcmoSession, type EcmoSessionOptions } from '../lib/ecmo-session';
import { quietLogger } from './helpers';

const config: EcmoConfig = { schemaVersion: 'v3', smoothingWindow: 2, trendDays: 7, logLevel: 'silent' };

function session(options: EcmoSessionOptions = {}): EcmoSession {
  return new EcmoSession({ config, logger: quietLogger(), ...options });
}

function form(overrides: Partial<AddRecordForm> = {}): AddRecordForm {
  return {
    date: '2024-01-01',
    time: '09:00',
    flow: '4.5',
    rpm: '3200',
    deltaP: '55',
    hemoglobin: '10.8',
    ...overrides,
  };
}

const provider: CorrelationProvider = xs => ({
  pearsonR: xs.length,
  pearsonP: 0,
  spearmanRho: xs.length,
  spearmanP: 0,
});

describe('EcmoSession.addRecord', () => {
  it('stores a valid form entry', () => {
    const s = session();
    assert.deepEqual(s.addRecord(form()), { success: true, recordNo: 1 });
    const [row] = s.records();
    assert.equal(row.recordedAt, '2024-01-01T09:00');
    assert.equal(row.r, 55 / 4.5);
    assert.equal(row.rPerHb, 55 / 4.5 / 10.8);
  });

  it('names the field and constraint that failed', () => {
    const s = session();
    const zeroFlow = s.addRecord(form({ flow: '0' }));
    assert.equal(zeroFlow.success, false);
    if (zeroFlow.success) return;
    assert.equal(zeroFlow.field, 'flow');
    assert.equal(zeroFlow.error, 'Flow must be greater than 0 (received 0)');

    const blankRpm = s.addRecord(form({ rpm: ' ' }));
    assert.ok(!blankRpm.success && blankRpm.error === 'RPM is required (received empty)');

    const textFlow = s.addRecord(form({ flow: 'abc' }));
    assert.ok(!textFlow.success && textFlow.error === 'Flow must be a number (received "abc")');

    assert.equal(s.records().length, 0);
  });

  it('rejects an impossible time', () => {
    const result = session().addRecord(form({ time: '25:00' }));
    assert.deepEqual(result.success ? null : [result.field, result.error], [
      'recordedAt',
      'Recorded at must be a valid date and time (received "2024-01-01 25:00")',
    ]);
  });

  it('accepts a missing glucose but not a negative one', () => {
    const s = session();
    assert.deepEqual(s.addRecord(form({ glucoseMmol: '' })), { success: true, recordNo: 1 });
    const negative = s.addRecord(form({ glucoseMmol: '-1' }));
    assert.ok(!negative.success && negative.field === 'glucoseMmol');
  });

  it('lets v1 sessions omit hemoglobin', () => {
    const s = session({ schemaVersion: 'v1' });
    assert.deepEqual(s.addRecord(form({ hemoglobin: null })), { success: true, recordNo: 1 });
    assert.equal(s.schema.id, 'v1');
  });
});

describe('EcmoSession table editing', () => {
  it('shows timestamps in display form', () => {
    const s = session();
    s.addRecord(form());
    assert.equal(s.displayTable()[0].RecordedAt, '2024-01-01 09:00');
  });

  it('applies edited display rows', () => {
    const s = session();
    s.addRecord(form());
    const rows = s.displayTable();
    rows[0].Flow = '5';
    rows[0].DeltaP = '50';
    assert.deepEqual(s.applyTableEdits(rows), { success: true });
    assert.equal(s.records()[0].r, 10);
  });

  it('turns data errors into failure responses', () => {
    const s = session();
    s.addRecord(form());
    const rows = s.displayTable();
    rows[0].RecordedAt = 'soon';
    assert.deepEqual(s.applyTableEdits(rows), {
      success: false,
      code: 'TIMESTAMP_PARSE',
      error: 'Could not parse RecordedAt in 1 row(s): 1. Use YYYY-MM-DD HH:MM.',
    });
    assert.deepEqual(s.deleteRecord(9), { success: false, code: 'NOT_FOUND', error: 'Record 9 does not exist' });
    assert.deepEqual(s.deleteRecord(1), { success: true });
  });

  it('deletes the last record and clears the table', () => {
    const s = session();
    s.addRecord(form());
    s.addRecord(form({ time: '10:00' }));
    s.deleteLastRecord();
    assert.deepEqual(s.records().map(r => r.recordNo), [1]);
    s.clearRecords();
    assert.equal(s.records().length, 0);
  });
});

describe('EcmoSession files', () => {
  it('imports a damaged export with warnings', () => {
    const s = session();
    const csv = [
      'RecordNo,RecordedAt,Flow,RPM,DeltaP',
      '3,2024-01-01 09:00,4,3000,40',
      '3,2024-01-01 10:00,0,3000,40',
      ',bad,4,3000,40',
    ].join('\n');
    const result = s.importCsv(csv);
    assert.deepEqual(result, {
      success: true,
      summary: { rows: 3, renumbered: 2, unparsedTimestamps: 1 },
      warnings: [
        '2 row(s) were given new record numbers',
        '1 row(s) have an unreadable RecordedAt and are left out of the charts',
        '1 row(s) have no usable Flow or DeltaP; R is undefined for them',
      ],
    });
    assert.deepEqual(s.records().map(r => r.recordNo), [3, 4, 5]);
  });

  it('refuses a file with no known columns and keeps the table', () => {
    const s = session();
    s.addRecord(form());
    const result = s.importCsv('Patient,Ward\nx,y');
    assert.equal(result.success ? null : result.code, 'SCHEMA_MISMATCH');
    assert.equal(s.records().length, 1);
  });

  it('exports with a time-stamped file name', () => {
    const s = session();
    s.addRecord(form({ flow: '4', rpm: '3000', deltaP: '40', hemoglobin: '10' }));
    const file = s.exportCsv(new Date(2024, 0, 2, 3, 4));
    assert.equal(file.fileName, 'ecmo_records_20240102_0304.csv');
    assert.equal(file.content.split('\n')[1], '1,2024-01-01T09:00,4,3000,40,10,,,10,1,750');
  });
});

describe('EcmoSession analysis', () => {
  function seeded(): EcmoSession {
    const s = session();
    s.addRecord(form({ date: '2024-01-01', time: '09:00', deltaP: '40' }));
    s.addRecord(form({ date: '2024-01-01', time: '10:00', deltaP: '60' }));
    s.addRecord(form({ date: '2024-01-09', time: '09:00', deltaP: '50' }));
    return s;
  }

  it('smooths with the configured window unless told otherwise', () => {
    const s = seeded();
    const trend = s.trend('deltaP');
    assert.deepEqual(trend.status === 'ok' ? trend.value.smoothed.map(([, v]) => v) : null, [40, 50, 55]);
    const wider = s.trend('deltaP', { window: 3 });
    assert.deepEqual(wider.status === 'ok' ? wider.value.smoothed.map(([, v]) => v) : null, [40, 50, 50]);
  });

  it('reports insufficient data when the day span leaves one point', () => {
    const trend = seeded().trend('deltaP', { days: 7 });
    assert.equal(trend.status, 'insufficient-data');
  });

  it('limits the daily view to the configured days', () => {
    assert.deepEqual(seeded().dailyTrend('deltaP'), [['2024-01-09T09:00', 50]]);
    assert.deepEqual(seeded().dailyTrend('deltaP', 8), [
      ['2024-01-01T09:00', 40],
      ['2024-01-09T09:00', 50],
    ]);
  });

  it('correlates through the configured provider', () => {
    const s = session({ statistics: provider });
    assert.throws(() => seeded().correlate('flow', 'deltaP'), /No statistics provider configured/);
    s.addRecord(form({ time: '09:00' }));
    s.addRecord(form({ time: '10:00' }));
    assert.equal(s.correlate('flow', 'deltaP').status, 'insufficient-data');
    s.addRecord(form({ time: '11:00' }));
    const result = s.correlate('flow', 'deltaP');
    assert.deepEqual(result.status === 'ok' ? result.value.n : null, 3);
    assert.deepEqual(s.scatter('flow', 'deltaP'), [[4.5, 55], [4.5, 55], [4.5, 55]]);
  });

  it('summarizes the latest day', () => {
    const summary = seeded().summary('2024-01-09T12:00:00.000Z');
    assert.equal(summary.dayIndex, 9);
    assert.equal(summary.metrics.find(m => m.metricId === 'DeltaP')?.changePct, 25);
  });
});
