/**
 * @fileoverview Derived-metrics engine.
 *
 * Recomputes every derived column of one record from its base fields. The
 * function reads nothing but the row itself, so mapping it over a table in
 * any order gives the same result, and applying it twice changes nothing.
 *
 * @module lib/calculations/derived-metrics
 */

import type { DerivedField, EcmoRecord, SchemaVersion } from '@/types/ecmo';
import { hasField } from '../schema/columns';
import { DERIVED_METRIC_DEFINITIONS } from './registry';
import { safeRatio, scale } from './numeric-policy';

export const MMOL_TO_MGDL_GLUCOSE = 18;

export function recompute(row: EcmoRecord, schema: SchemaVersion): EcmoRecord {
  const next: EcmoRecord = { ...row };

  // 1. unit conversion
  next.glucoseMgdl = hasField(schema, 'glucoseMgdl') ? scale(next.glucoseMmol, MMOL_TO_MGDL_GLUCOSE) : null;
  // 2-3. flow ratios
  next.r = hasField(schema, 'r') ? safeRatio(next.deltaP, next.flow) : null;
  next.rpmPerFlow = hasField(schema, 'rpmPerFlow') ? safeRatio(next.rpm, next.flow) : null;
  // 4. depends on r
  next.rPerHb = hasField(schema, 'rPerHb') ? safeRatio(next.r, next.hemoglobin) : null;

  return next;
}

export function recomputeAll(rows: readonly EcmoRecord[], schema: SchemaVersion): EcmoRecord[] {
  return rows.map(row => recompute(row, schema));
}

/** Derived columns of the schema that could not be computed for this row. */
export function undefinedDerivedFields(row: EcmoRecord, schema: SchemaVersion): DerivedField[] {
  return DERIVED_METRIC_DEFINITIONS
    .filter(def => hasField(schema, def.field) && row[def.field] === null)
    .map(def => def.field);
}
