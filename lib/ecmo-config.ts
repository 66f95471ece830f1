/**
 * @fileoverview Runtime configuration read from environment variables.
 *
 * - ECMO_SCHEMA_VERSION: active column set (v1 | v2 | v3)
 * - ECMO_SMOOTHING_WINDOW: default rolling-mean window, in samples
 * - ECMO_TREND_DAYS: default span of the "last N days" views
 * - ECMO_LOG_LEVEL: console threshold for the logger
 */

import type { LogThreshold } from './logger';
import type { SchemaVersionId } from '@/types/ecmo';

export interface EcmoConfig {
  schemaVersion: SchemaVersionId;
  smoothingWindow: number;
  trendDays: number;
  logLevel: LogThreshold;
}

type Env = Record<string, string | undefined>;

const SCHEMA_VERSIONS: readonly SchemaVersionId[] = ['v1', 'v2', 'v3'];
const LOG_THRESHOLDS: readonly LogThreshold[] = ['debug', 'info', 'warn', 'error', 'silent'];

function readEnvString(env: Env, name: string): string {
  return String(env[name] || '').trim().toLowerCase();
}

function readEnvPositiveInt(env: Env, name: string, defaultValue: number): number {
  const value = readEnvString(env, name);
  if (!value) return defaultValue;
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : defaultValue;
}

function readEnvChoice<T extends string>(env: Env, name: string, choices: readonly T[], defaultValue: T): T {
  const value = readEnvString(env, name);
  const match = choices.find(choice => choice === value);
  return match ?? defaultValue;
}

function defaultLogLevel(env: Env): LogThreshold {
  const nodeEnv = readEnvString(env, 'NODE_ENV');
  if (nodeEnv === 'development') return 'debug';
  if (nodeEnv === 'test') return 'silent';
  return 'warn';
}

export function getEcmoConfig(env: Env = process.env): EcmoConfig {
  return {
    schemaVersion: readEnvChoice(env, 'ECMO_SCHEMA_VERSION', SCHEMA_VERSIONS, 'v3'),
    smoothingWindow: readEnvPositiveInt(env, 'ECMO_SMOOTHING_WINDOW', 3),
    trendDays: readEnvPositiveInt(env, 'ECMO_TREND_DAYS', 7),
    logLevel: readEnvChoice(env, 'ECMO_LOG_LEVEL', LOG_THRESHOLDS, defaultLogLevel(env)),
  };
}
