import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { getEcmoConfig } from '../lib/ecmo-config';

describe('getEcmoConfig', () => {
  it('falls back to defaults', () => {
    assert.deepEqual(getEcmoConfig({}), {
      schemaVersion: 'v3',
      smoothingWindow: 3,
      trendDays: 7,
      logLevel: 'warn',
    });
  });

  it('reads overrides case-insensitively', () => {
    const config = getEcmoConfig({
      ECMO_SCHEMA_VERSION: ' V1 ',
      ECMO_SMOOTHING_WINDOW: '5',
      ECMO_TREND_DAYS: '14',
      ECMO_LOG_LEVEL: 'ERROR',
    });
    assert.deepEqual(config, { schemaVersion: 'v1', smoothingWindow: 5, trendDays: 14, logLevel: 'error' });
  });

  it('ignores values it cannot use', () => {
    const config = getEcmoConfig({
      ECMO_SCHEMA_VERSION: 'v9',
      ECMO_SMOOTHING_WINDOW: '2.5',
      ECMO_TREND_DAYS: '0',
      ECMO_LOG_LEVEL: 'loud',
    });
    assert.deepEqual(config, { schemaVersion: 'v3', smoothingWindow: 3, trendDays: 7, logLevel: 'warn' });
  });

  it('derives the log level from NODE_ENV', () => {
    assert.equal(getEcmoConfig({ NODE_ENV: 'development' }).logLevel, 'debug');
    assert.equal(getEcmoConfig({ NODE_ENV: 'test' }).logLevel, 'silent');
    assert.equal(getEcmoConfig({ NODE_ENV: 'test', ECMO_LOG_LEVEL: 'info' }).logLevel, 'info');
  });
});
