/**
 * @fileoverview Error types raised by the record store, normalizer and CSV codec.
 *
 * Every error carries a stable `code` so the session layer can turn it into a
 * response without inspecting messages.
 */

import type { RecordField } from '@/types/ecmo';

export type EcmoErrorCode = 'VALIDATION' | 'TIMESTAMP_PARSE' | 'SCHEMA_MISMATCH' | 'NOT_FOUND';

export class EcmoDataError extends Error {
  readonly code: EcmoErrorCode;

  constructor(code: EcmoErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A single broken constraint. `row` is the 1-based position in the submitted
 * table, absent for single-record operations.
 */
export interface FieldViolation {
  field: RecordField;
  label: string;
  constraint: string;
  value: unknown;
  row?: number;
}

export function describeViolation(v: FieldViolation): string {
  const prefix = v.row !== undefined ? `Row ${v.row}: ` : '';
  return `${prefix}${v.label} ${v.constraint} (received ${formatValue(v.value)})`;
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined || value === '') return 'empty';
  if (typeof value === 'string') return `"${value}"`;
  return String(value);
}

export class ValidationError extends EcmoDataError {
  readonly violations: FieldViolation[];

  constructor(violations: FieldViolation[]) {
    super('VALIDATION', violations.map(describeViolation).join('; '));
    this.violations = violations;
  }

  /** Field of the first violation */
  get field(): RecordField | null {
    return this.violations[0]?.field ?? null;
  }
}

export interface TimestampFailure {
  row: number;
  recordNo: number | null;
  value: unknown;
}

export class TimestampParseError extends EcmoDataError {
  readonly failures: TimestampFailure[];

  constructor(failures: TimestampFailure[]) {
    const rows = failures.map(f => f.row).join(', ');
    super(
      'TIMESTAMP_PARSE',
      `Could not parse RecordedAt in ${failures.length} row(s): ${rows}. Use YYYY-MM-DD HH:MM.`,
    );
    this.failures = failures;
  }
}

export class SchemaMismatchError extends EcmoDataError {
  readonly missing: string[];
  readonly found: string[];

  constructor(missing: string[], found: string[]) {
    super(
      'SCHEMA_MISMATCH',
      `CSV has none of the required columns (${missing.join(', ')}); found: ${found.length ? found.join(', ') : 'no columns'}`,
    );
    this.missing = missing;
    this.found = found;
  }
}

export class NotFoundError extends EcmoDataError {
  readonly recordNo: number;

  constructor(recordNo: number) {
    super('NOT_FOUND', `Record ${recordNo} does not exist`);
    this.recordNo = recordNo;
  }
}

export function isEcmoDataError(error: unknown): error is EcmoDataError {
  return error instanceof EcmoDataError;
}
