/**
 * @fileoverview Versioned canonical column sets.
 *
 * Each revision of the bedside sheet added columns; a version is the ordered
 * column list plus the validation policy that went with it. Older tables are
 * upgraded to the active version by the normalizer, never rejected.
 *
 * @module lib/schema/columns
 */

import type { ColumnDefinition, RecordField, SchemaVersion, SchemaVersionId } from '@/types/ecmo';

// ============================================================================
// COLUMN DEFINITIONS
// ============================================================================

export const COLUMN_DEFINITIONS: Record<RecordField, ColumnDefinition> = {
  recordNo: {
    field: 'recordNo',
    header: 'RecordNo',
    kind: 'identifier',
    derived: false,
    label: 'Record No.',
    unit: null,
    aliases: ['No', 'No.', 'Record', 'RecordID', 'Seq'],
  },
  recordedAt: {
    field: 'recordedAt',
    header: 'RecordedAt',
    kind: 'timestamp',
    derived: false,
    label: 'Recorded at',
    unit: null,
    aliases: ['Timestamp', 'DateTime', 'Recorded At'],
  },
  flow: {
    field: 'flow',
    header: 'Flow',
    kind: 'number',
    derived: false,
    label: 'Flow',
    unit: 'L/min',
    aliases: ['Flow (L/min)', 'Flow_Lmin'],
  },
  rpm: {
    field: 'rpm',
    header: 'RPM',
    kind: 'number',
    derived: false,
    label: 'RPM',
    unit: 'rpm',
    aliases: ['Rpm', 'Speed'],
  },
  deltaP: {
    field: 'deltaP',
    header: 'DeltaP',
    kind: 'number',
    derived: false,
    label: 'Delta P',
    unit: 'mmHg',
    aliases: ['Delta P', 'DeltaP (mmHg)', 'dP', 'ΔP'],
  },
  hemoglobin: {
    field: 'hemoglobin',
    header: 'Hb',
    kind: 'number',
    derived: false,
    label: 'Hemoglobin',
    unit: 'g/dL',
    aliases: ['HGB', 'Hgb', 'Hemoglobin', 'Hb (g/dL)'],
  },
  glucoseMmol: {
    field: 'glucoseMmol',
    header: 'Glucose_mmol',
    kind: 'number',
    derived: false,
    label: 'Glucose',
    unit: 'mmol/L',
    aliases: ['Glucose', 'Glucose (mmol/L)', 'BG_mmol'],
  },
  glucoseMgdl: {
    field: 'glucoseMgdl',
    header: 'Glucose_mgdl',
    kind: 'number',
    derived: true,
    label: 'Glucose',
    unit: 'mg/dL',
    aliases: ['Glucose (mg/dL)', 'BG_mgdl'],
  },
  r: {
    field: 'r',
    header: 'R',
    kind: 'number',
    derived: true,
    label: 'R (ΔP/Flow)',
    unit: 'mmHg·min/L',
    aliases: ['Resistance'],
  },
  rPerHb: {
    field: 'rPerHb',
    header: 'R_per_Hb',
    kind: 'number',
    derived: true,
    label: 'R/Hb',
    unit: null,
    aliases: ['R/Hb', 'R_Hb'],
  },
  rpmPerFlow: {
    field: 'rpmPerFlow',
    header: 'RPM_per_Flow',
    kind: 'number',
    derived: true,
    label: 'RPM/Flow',
    unit: 'rpm·min/L',
    aliases: ['RPM/Flow', 'RPM_Flow'],
  },
};

/** Columns a restored CSV must share at least one of. */
export const CORE_FIELDS: readonly RecordField[] = ['recordedAt', 'flow', 'rpm', 'deltaP'];

// ============================================================================
// VERSIONS
// ============================================================================

function columns(fields: RecordField[]): ColumnDefinition[] {
  return fields.map(field => COLUMN_DEFINITIONS[field]);
}

export const SCHEMA_VERSIONS: Record<SchemaVersionId, SchemaVersion> = {
  v1: {
    id: 'v1',
    columns: columns(['recordNo', 'recordedAt', 'flow', 'rpm', 'deltaP', 'hemoglobin', 'r', 'rpmPerFlow']),
    hemoglobinRequired: false,
    deltaPInteger: true,
  },
  v2: {
    id: 'v2',
    columns: columns(['recordNo', 'recordedAt', 'flow', 'rpm', 'deltaP', 'hemoglobin', 'r', 'rPerHb', 'rpmPerFlow']),
    hemoglobinRequired: true,
    deltaPInteger: true,
  },
  v3: {
    id: 'v3',
    columns: columns([
      'recordNo',
      'recordedAt',
      'flow',
      'rpm',
      'deltaP',
      'hemoglobin',
      'glucoseMmol',
      'glucoseMgdl',
      'r',
      'rPerHb',
      'rpmPerFlow',
    ]),
    hemoglobinRequired: true,
    deltaPInteger: false,
  },
};

export const LATEST_SCHEMA_VERSION: SchemaVersionId = 'v3';

export function getSchemaVersion(id: SchemaVersionId = LATEST_SCHEMA_VERSION): SchemaVersion {
  return SCHEMA_VERSIONS[id];
}

export function hasField(schema: SchemaVersion, field: RecordField): boolean {
  return schema.columns.some(column => column.field === field);
}

export function canonicalHeaders(schema: SchemaVersion): string[] {
  return schema.columns.map(column => column.header);
}

// ============================================================================
// HEADER MATCHING
// ============================================================================

function headerKey(name: string): string {
  return name.trim().toLowerCase();
}

/** Names under which a field may appear in input, canonical header first. */
export function acceptedNames(field: RecordField): string[] {
  const def = COLUMN_DEFINITIONS[field];
  return [def.header, field, ...def.aliases];
}

/**
 * Resolve which input key (if any) carries `field`. Matching ignores case and
 * surrounding whitespace; the canonical header wins over aliases.
 */
export function resolveInputKey(keys: readonly string[], field: RecordField): string | null {
  const byKey = new Map<string, string>();
  for (const key of keys) {
    const k = headerKey(key);
    if (!byKey.has(k)) byKey.set(k, key);
  }
  for (const name of acceptedNames(field)) {
    const match = byKey.get(headerKey(name));
    if (match !== undefined) return match;
  }
  return null;
}
