/**
 * @fileoverview Base-field constraints applied on add and on table edits.
 *
 * @module lib/schema/validation
 */

import type { EcmoRecord, RawRow, RecordField, SchemaVersion } from '@/types/ecmo';
import { SchemaMismatchError, type FieldViolation } from '../errors';
import { COLUMN_DEFINITIONS, CORE_FIELDS, resolveInputKey } from './columns';
import { normalizeIdentifier } from './normalize';

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function violation(field: RecordField, constraint: string, value: unknown, row?: number): FieldViolation {
  const v: FieldViolation = { field, label: COLUMN_DEFINITIONS[field].label, constraint, value };
  if (row !== undefined) v.row = row;
  return v;
}

interface NumericRule {
  required: boolean;
  positive: boolean;
  integer: boolean;
}

function rulesFor(field: RecordField, schema: SchemaVersion): NumericRule | null {
  switch (field) {
    case 'flow':
      return { required: true, positive: true, integer: false };
    case 'rpm':
      return { required: true, positive: false, integer: true };
    case 'deltaP':
      return { required: true, positive: false, integer: schema.deltaPInteger };
    case 'hemoglobin':
      return { required: schema.hemoglobinRequired, positive: schema.hemoglobinRequired, integer: false };
    case 'glucoseMmol':
      return { required: false, positive: false, integer: false };
    default:
      return null;
  }
}

/**
 * Check one normalized record against the schema's base-field rules.
 *
 * `raw` is the row the record was normalized from; it lets a cell that failed
 * numeric coercion be reported as "must be a number" instead of "is required".
 */
export function validateRecord(
  raw: RawRow,
  record: EcmoRecord,
  schema: SchemaVersion,
  row?: number,
): FieldViolation[] {
  const violations: FieldViolation[] = [];
  const keys = Object.keys(raw);

  for (const column of schema.columns) {
    const field = column.field;
    const rule = rulesFor(field, schema);
    if (!rule || field === 'recordedAt') continue;

    const key = resolveInputKey(keys, field);
    const rawValue = key !== null ? raw[key] : undefined;
    const value = record[field];

    if (value === null) {
      if (!isBlank(rawValue)) {
        violations.push(violation(field, 'must be a number', rawValue, row));
      } else if (rule.required) {
        violations.push(violation(field, 'is required', rawValue, row));
      }
      continue;
    }

    if (rule.positive && value <= 0) {
      violations.push(violation(field, 'must be greater than 0', value, row));
    } else if (value < 0) {
      violations.push(violation(field, 'must not be negative', value, row));
    } else if (rule.integer && !Number.isInteger(value)) {
      violations.push(violation(field, 'must be a whole number', value, row));
    }
  }

  return violations;
}

/**
 * An identifier cell that holds something but not a positive whole number.
 * Blank cells pass; the store numbers those rows itself.
 */
export function identifierViolation(value: unknown, row?: number): FieldViolation | null {
  if (isBlank(value) || normalizeIdentifier(value) !== null) return null;
  return violation('recordNo', 'must be a positive whole number', value, row);
}

export function timestampViolation(value: unknown, row?: number): FieldViolation {
  return violation('recordedAt', 'must be a valid date and time (YYYY-MM-DD HH:MM)', value, row);
}

/** Flag identifiers that repeat an earlier row's. */
export function duplicateIdentifierViolations(records: readonly EcmoRecord[]): FieldViolation[] {
  const seen = new Set<number>();
  const violations: FieldViolation[] = [];
  records.forEach((record, index) => {
    if (record.recordNo === null) return;
    if (seen.has(record.recordNo)) {
      violations.push(violation('recordNo', 'must be unique', record.recordNo, index + 1));
    }
    seen.add(record.recordNo);
  });
  return violations;
}

/**
 * Throw when a table shares none of the core columns with the known headers
 * and aliases. A table missing only some of them is accepted and upgraded.
 */
export function assertCoreColumns(headers: readonly string[]): void {
  const present = CORE_FIELDS.filter(field => resolveInputKey(headers, field) !== null);
  if (present.length === 0) {
    throw new SchemaMismatchError(
      CORE_FIELDS.map(field => COLUMN_DEFINITIONS[field].header),
      [...headers],
    );
  }
}
