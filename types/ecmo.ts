/**
 * @fileoverview Type definitions for the ECMO circuit log.
 *
 * Every cell of a record is either a defined value or `null`; `null` is the
 * only "undefined" marker, so a missing hemoglobin is never confused with 0.
 *
 * @module types/ecmo
 */

// ============================================================================
// RECORD FIELDS
// ============================================================================

/** Internal field names, in canonical column order. */
export const RECORD_FIELDS = [
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
] as const;

export type RecordField = (typeof RECORD_FIELDS)[number];

/** Every field that holds a number (everything except the timestamp). */
export type NumericField = Exclude<RecordField, 'recordedAt'>;

/** Fields entered by the operator. */
export type BaseField = 'flow' | 'rpm' | 'deltaP' | 'hemoglobin' | 'glucoseMmol';

/** Fields computed from base fields and never edited directly. */
export type DerivedField = 'glucoseMgdl' | 'r' | 'rPerHb' | 'rpmPerFlow';

/**
 * One circuit observation.
 *
 * `recordedAt` holds `YYYY-MM-DDTHH:MM` once the store has accepted the row;
 * rows restored from a damaged export may keep the original text.
 */
export type EcmoRecord = {
  recordNo: number | null;
  recordedAt: string | null;
  flow: number | null;
  rpm: number | null;
  deltaP: number | null;
  hemoglobin: number | null;
  glucoseMmol: number | null;
  glucoseMgdl: number | null;
  r: number | null;
  rPerHb: number | null;
  rpmPerFlow: number | null;
};

/** A table row of unknown vintage: header or field name to cell value. */
export type RawRow = Record<string, unknown>;

// ============================================================================
// SCHEMA VERSIONS
// ============================================================================

export type SchemaVersionId = 'v1' | 'v2' | 'v3';

export type ColumnKind = 'identifier' | 'timestamp' | 'number';

export interface ColumnDefinition {
  field: RecordField;
  /** Canonical CSV header */
  header: string;
  kind: ColumnKind;
  derived: boolean;
  label: string;
  unit: string | null;
  /** Headers seen in older exports */
  aliases: string[];
}

export interface SchemaVersion {
  id: SchemaVersionId;
  columns: ColumnDefinition[];
  /** Whether `hemoglobin > 0` is a hard requirement on add and edit */
  hemoglobinRequired: boolean;
  /** Whether ΔP is recorded as a whole number of mmHg */
  deltaPInteger: boolean;
}

// ============================================================================
// OPERATION INPUTS
// ============================================================================

/** Base fields accepted by the record store; `null` marks a value not entered. */
export interface RecordInput {
  /** Wall-clock text, or a `Date` whose UTC fields hold the wall-clock reading */
  recordedAt: string | Date;
  flow: number | null;
  rpm: number | null;
  deltaP: number | null;
  hemoglobin: number | null;
  glucoseMmol?: number | null;
}

/** Raw values as they arrive from the add-record form. */
export interface AddRecordForm {
  date: string;
  time: string;
  flow: number | string;
  rpm: number | string;
  deltaP: number | string;
  hemoglobin: number | string | null;
  glucoseMmol?: number | string | null;
}

// ============================================================================
// ANALYSIS RESULTS
// ============================================================================

/** Not enough observations yet; a normal outcome, never an exception. */
export interface InsufficientData {
  status: 'insufficient-data';
  required: number;
  available: number;
  message: string;
}

export type AnalysisResult<T> = { status: 'ok'; value: T } | InsufficientData;

/** `[timestamp, value]`, timestamp as `YYYY-MM-DDTHH:MM` */
export type TimePoint = [string, number];

/** `[x, y]` */
export type XYPoint = [number, number];

export interface CorrelationStatistics {
  pearsonR: number;
  pearsonP: number;
  spearmanRho: number;
  spearmanP: number;
}

/**
 * External statistics routine. Receives equal-length sequences with paired
 * missing values already removed.
 */
export type CorrelationProvider = (xs: readonly number[], ys: readonly number[]) => CorrelationStatistics;
