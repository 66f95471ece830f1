/**
 * @fileoverview Session handle used by the bedside UI.
 *
 * Wraps one RecordStore with the form, grid and file interfaces. Every method
 * returns a response object; data errors are caught here and reported with
 * the field and constraint that failed, so the UI never sees a throw for bad
 * input.
 *
 * @module lib/ecmo-session
 *
 * @example
 * ```ts
 * const session = new EcmoSession();
 * const res = session.addRecord({ date: '2024-01-01', time: '09:00', flow: '4.5', rpm: '3200', deltaP: '55', hemoglobin: '10.8' });
 * if (!res.success) showFieldError(res.field, res.error);
 * ```
 */

import type {
  AddRecordForm,
  AnalysisResult,
  CorrelationProvider,
  EcmoRecord,
  NumericField,
  RawRow,
  RecordField,
  SchemaVersion,
  SchemaVersionId,
  TimePoint,
  XYPoint,
} from '@/types/ecmo';
import { lastNDays } from './aggregation';
import { undefinedDerivedFields } from './calculations/derived-metrics';
import { trendSeries, dailySeries, scatterPairs, type TrendSeries } from './chart-series';
import { correlate, type CorrelationReport } from './correlation';
import { exportFileName, exportRecordsCsv, parseRecordsCsvStrict } from './csv-parser';
import { getEcmoConfig, type EcmoConfig } from './ecmo-config';
import {
  ValidationError,
  describeViolation,
  isEcmoDataError,
  type EcmoErrorCode,
  type FieldViolation,
} from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import { buildDailySummary, type DailySummary } from './metrics/daily-summary';
import { RecordStore, type RestoreSummary } from './record-store';
import { COLUMN_DEFINITIONS, getSchemaVersion } from './schema/columns';
import { normalizeNumber, toHeaderRows } from './schema/normalize';
import { combineDateAndTime, formatDisplay, parseRecordedAt } from './timestamps';

// ============================================================================
// RESPONSES
// ============================================================================

export type AddRecordResponse =
  | { success: true; recordNo: number }
  | { success: false; field: RecordField | null; error: string; violations: FieldViolation[] };

export type OperationResponse =
  | { success: true }
  | { success: false; code: EcmoErrorCode; error: string };

export type ImportResponse =
  | { success: true; summary: RestoreSummary; warnings: string[] }
  | { success: false; code: EcmoErrorCode; error: string };

export interface CsvExport {
  fileName: string;
  content: string;
}

export interface TrendOptions {
  /** Rolling-mean window in samples; defaults to the configured window */
  window?: number;
  /** Only records from the last N days before the latest record */
  days?: number;
}

export interface EcmoSessionOptions {
  schemaVersion?: SchemaVersionId;
  smoothingWindow?: number;
  trendDays?: number;
  logger?: Logger;
  statistics?: CorrelationProvider;
  config?: EcmoConfig;
}

function failure(error: unknown): { success: false; code: EcmoErrorCode; error: string } {
  if (isEcmoDataError(error)) {
    return { success: false, code: error.code, error: error.message };
  }
  throw error;
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

// ============================================================================
// SESSION
// ============================================================================

export class EcmoSession {
  readonly store: RecordStore;
  readonly smoothingWindow: number;
  readonly trendDays: number;
  private readonly log: Logger;
  private readonly statistics: CorrelationProvider | undefined;

  constructor(options: EcmoSessionOptions = {}) {
    const config = options.config ?? getEcmoConfig();
    this.log = options.logger ?? defaultLogger;
    this.store = new RecordStore({
      schema: getSchemaVersion(options.schemaVersion ?? config.schemaVersion),
      logger: this.log,
    });
    this.smoothingWindow = options.smoothingWindow ?? config.smoothingWindow;
    this.trendDays = options.trendDays ?? config.trendDays;
    this.statistics = options.statistics;
  }

  get schema(): SchemaVersion {
    return this.store.schema;
  }

  records(): EcmoRecord[] {
    return this.store.snapshot();
  }

  // --------------------------------------------------------------------------
  // Entry and editing
  // --------------------------------------------------------------------------

  addRecord(form: AddRecordForm): AddRecordResponse {
    const violations: FieldViolation[] = [];

    const readNumber = (field: RecordField, value: unknown): number | null => {
      if (isBlank(value)) return null;
      const n = normalizeNumber(value);
      if (n === null) {
        violations.push({ field, label: COLUMN_DEFINITIONS[field].label, constraint: 'must be a number', value });
      }
      return n;
    };

    const recordedAt = combineDateAndTime(form.date, form.time);
    if (!recordedAt) {
      violations.push({
        field: 'recordedAt',
        label: COLUMN_DEFINITIONS.recordedAt.label,
        constraint: 'must be a valid date and time',
        value: `${form.date} ${form.time}`,
      });
    }
    const flow = readNumber('flow', form.flow);
    const rpm = readNumber('rpm', form.rpm);
    const deltaP = readNumber('deltaP', form.deltaP);
    const hemoglobin = readNumber('hemoglobin', form.hemoglobin);
    const glucoseMmol = readNumber('glucoseMmol', form.glucoseMmol);

    if (!recordedAt || violations.length > 0) {
      return this.rejected(new ValidationError(violations));
    }

    try {
      // missing required numbers are reported by the store's own rules
      const recordNo = this.store.add({ recordedAt, flow, rpm, deltaP, hemoglobin, glucoseMmol });
      return { success: true, recordNo };
    } catch (error) {
      if (error instanceof ValidationError) return this.rejected(error);
      throw error;
    }
  }

  private rejected(error: ValidationError): AddRecordResponse {
    this.log.debug('Add record form rejected', { violations: error.violations });
    return {
      success: false,
      field: error.field,
      error: error.violations.map(describeViolation).join('; '),
      violations: error.violations,
    };
  }

  /** Rows keyed by canonical header with `YYYY-MM-DD HH:MM` timestamps, for the edit grid. */
  displayTable(): RawRow[] {
    const header = COLUMN_DEFINITIONS.recordedAt.header;
    return toHeaderRows(this.store.snapshot(), this.schema).map(row => {
      const cell = row[header];
      const parsed = parseRecordedAt(cell);
      return { ...row, [header]: parsed ? formatDisplay(parsed) : cell };
    });
  }

  applyTableEdits(rows: readonly RawRow[]): OperationResponse {
    try {
      this.store.applyEdits(rows);
      return { success: true };
    } catch (error) {
      return failure(error);
    }
  }

  deleteRecord(recordNo: number): OperationResponse {
    try {
      this.store.delete(recordNo);
      return { success: true };
    } catch (error) {
      return failure(error);
    }
  }

  deleteLastRecord(): void {
    this.store.deleteLast();
  }

  /** The UI must have confirmed with the operator before calling this. */
  clearRecords(): void {
    this.store.clear();
  }

  // --------------------------------------------------------------------------
  // Files
  // --------------------------------------------------------------------------

  importCsv(csvText: string): ImportResponse {
    try {
      const { headers, rows } = parseRecordsCsvStrict(csvText);
      const summary = this.store.restore(rows, headers);
      return { success: true, summary, warnings: this.restoreWarnings(summary) };
    } catch (error) {
      return failure(error);
    }
  }

  private restoreWarnings(summary: RestoreSummary): string[] {
    const warnings: string[] = [];
    if (summary.renumbered > 0) {
      warnings.push(`${summary.renumbered} row(s) were given new record numbers`);
    }
    if (summary.unparsedTimestamps > 0) {
      warnings.push(`${summary.unparsedTimestamps} row(s) have an unreadable RecordedAt and are left out of the charts`);
    }
    const withoutR = this.store.snapshot().filter(record => undefinedDerivedFields(record, this.schema).includes('r'));
    if (withoutR.length > 0) {
      warnings.push(`${withoutR.length} row(s) have no usable Flow or DeltaP; R is undefined for them`);
    }
    return warnings;
  }

  exportCsv(now?: Date): CsvExport {
    return {
      fileName: exportFileName(now),
      content: exportRecordsCsv(this.store.snapshot(), this.schema),
    };
  }

  // --------------------------------------------------------------------------
  // Analysis
  // --------------------------------------------------------------------------

  trend(field: NumericField, options: TrendOptions = {}): AnalysisResult<TrendSeries> {
    const records = this.store.snapshot();
    const scoped = options.days !== undefined ? lastNDays(records, options.days).map(entry => entry.record) : records;
    return trendSeries(scoped, field, options.window ?? this.smoothingWindow);
  }

  /** Daily-first points over the configured number of trend days. */
  dailyTrend(field: NumericField, days: number = this.trendDays): TimePoint[] {
    return dailySeries(this.store.snapshot(), field, days);
  }

  scatter(x: NumericField, y: NumericField): XYPoint[] {
    return scatterPairs(this.store.snapshot(), x, y);
  }

  correlate(x: NumericField, y: NumericField, provider?: CorrelationProvider): AnalysisResult<CorrelationReport> {
    const statistics = provider ?? this.statistics;
    if (!statistics) {
      throw new Error('No statistics provider configured for correlation');
    }
    return correlate(this.store.snapshot(), x, y, statistics);
  }

  summary(computedAt?: string): DailySummary {
    return buildDailySummary(this.store.snapshot(), this.schema, computedAt);
  }
}
