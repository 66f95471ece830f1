/**
 * @fileoverview Schema normalizer.
 *
 * Turns a table of unknown vintage (a freshly entered row, an edited grid or
 * an uploaded CSV) into canonical records for a schema version. Coercion
 * failures are per cell: a bad cell becomes `null`, the row is kept.
 *
 * @module lib/schema/normalize
 */

import type { EcmoRecord, RawRow, RecordField, SchemaVersion } from '@/types/ecmo';
import { RECORD_FIELDS } from '@/types/ecmo';
import { formatIsoMinute } from '../timestamps';
import { COLUMN_DEFINITIONS, hasField, resolveInputKey } from './columns';

const NUMERIC_TEXT = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Coerce a cell to a finite number, or `null`. */
export function normalizeNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;
  const text = value.trim();
  if (!NUMERIC_TEXT.test(text)) return null;
  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}

/** Identifiers must be positive whole numbers. */
export function normalizeIdentifier(value: unknown): number | null {
  const n = normalizeNumber(value);
  return n !== null && Number.isInteger(n) && n > 0 ? n : null;
}

export function normalizeTimestampCell(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : formatIsoMinute(value);
  }
  if (typeof value === 'number' || typeof value === 'string') {
    const text = String(value).trim();
    return text ? text : null;
  }
  return null;
}

export function emptyRecord(): EcmoRecord {
  return {
    recordNo: null,
    recordedAt: null,
    flow: null,
    rpm: null,
    deltaP: null,
    hemoglobin: null,
    glucoseMmol: null,
    glucoseMgdl: null,
    r: null,
    rPerHb: null,
    rpmPerFlow: null,
  };
}

function collectKeys(rows: readonly RawRow[]): string[] {
  const keys = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) keys.add(key);
  }
  return [...keys];
}

function normalizeCell(field: RecordField, value: unknown): number | string | null {
  switch (COLUMN_DEFINITIONS[field].kind) {
    case 'identifier':
      return normalizeIdentifier(value);
    case 'timestamp':
      return normalizeTimestampCell(value);
    case 'number':
      return normalizeNumber(value);
  }
}

/**
 * Normalize a raw table to canonical records.
 *
 * - output has the same number of rows, in the same order
 * - columns outside the schema, and columns absent from the input, are `null`
 * - when no row carries a usable identifier, identifiers are back-filled 1..N
 * - idempotent: normalizing a normalized table returns an equal table
 */
export function normalizeTable(rows: readonly RawRow[], schema: SchemaVersion): EcmoRecord[] {
  const keys = collectKeys(rows);
  const sourceKey = new Map<RecordField, string>();
  for (const field of RECORD_FIELDS) {
    if (!hasField(schema, field)) continue;
    const key = resolveInputKey(keys, field);
    if (key !== null) sourceKey.set(field, key);
  }

  const normalized = rows.map(row => {
    const record = emptyRecord();
    for (const [field, key] of sourceKey) {
      const value = normalizeCell(field, row[key]);
      if (field === 'recordedAt') {
        record.recordedAt = typeof value === 'string' ? value : null;
      } else {
        record[field] = typeof value === 'number' ? value : null;
      }
    }
    return record;
  });

  if (normalized.length > 0 && normalized.every(record => record.recordNo === null)) {
    normalized.forEach((record, index) => {
      record.recordNo = index + 1;
    });
  }

  return normalized;
}

/** Canonical records as rows keyed by the schema's headers, in column order. */
export function toHeaderRows(records: readonly EcmoRecord[], schema: SchemaVersion): RawRow[] {
  return records.map(record => {
    const row: RawRow = {};
    for (const column of schema.columns) {
      row[column.header] = record[column.field];
    }
    return row;
  });
}
