import type { EcmoRecord, RecordInput, SchemaVersionId } from '../types/ecmo';
import { Logger } from '../lib/logger';
import { RecordStore } from '../lib/record-store';
import { getSchemaVersion } from '../lib/schema/columns';
import { emptyRecord } from '../lib/schema/normalize';

export function quietLogger(): Logger {
  return new Logger({ minLevel: 'silent' });
}

export function makeStore(version: SchemaVersionId = 'v3'): RecordStore {
  return new RecordStore({ schema: getSchemaVersion(version), logger: quietLogger() });
}

export function record(fields: Partial<EcmoRecord>): EcmoRecord {
  return { ...emptyRecord(), ...fields };
}

export function reading(recordedAt: string, overrides: Partial<RecordInput> = {}): RecordInput {
  return {
    recordedAt,
    flow: 4,
    rpm: 3000,
    deltaP: 40,
    hemoglobin: 10,
    ...overrides,
  };
}
