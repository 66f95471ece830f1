/**
 * @file record-store.ts
 * @description In-memory record table for one monitoring session.
 *
 * The store owns record numbering and keeps every row normalized with its
 * derived columns recomputed. Each mutating operation either completes or
 * leaves the table exactly as it was.
 *
 * @dataflow
 *   form / grid / CSV rows → normalizeTable() → validation → recompute() → rows
 */

import type { EcmoRecord, RawRow, RecordInput, SchemaVersion } from '@/types/ecmo';
import { recompute } from './calculations/derived-metrics';
import { NotFoundError, TimestampParseError, ValidationError, type TimestampFailure } from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import { getSchemaVersion, resolveInputKey } from './schema/columns';
import { normalizeIdentifier, normalizeTable } from './schema/normalize';
import {
  assertCoreColumns,
  duplicateIdentifierViolations,
  identifierViolation,
  timestampViolation,
  validateRecord,
} from './schema/validation';
import { canonicalRecordedAt, formatIsoMinute, parseRecordedAt } from './timestamps';

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/** Largest valid record number, or 0 when there is none. */
export function maxRecordNo(records: readonly EcmoRecord[]): number {
  let max = 0;
  for (const record of records) {
    if (record.recordNo !== null && record.recordNo > max) max = record.recordNo;
  }
  return max;
}

function collectHeaders(rows: readonly RawRow[]): string[] {
  const headers = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) headers.add(key);
  }
  return [...headers];
}

interface TimedRow {
  record: EcmoRecord;
  at: Date;
}

export interface RestoreSummary {
  rows: number;
  /** Rows given a fresh number because theirs was missing or repeated */
  renumbered: number;
  /** Rows whose timestamp could not be read; kept, but left out of time views */
  unparsedTimestamps: number;
}

export interface RecordStoreOptions {
  schema?: SchemaVersion;
  logger?: Logger;
}

// ============================================================================
// STORE
// ============================================================================

export class RecordStore {
  readonly schema: SchemaVersion;
  private readonly log: Logger;
  private rows: EcmoRecord[] = [];
  /** Highest number handed out since the last clear/restore */
  private highWater = 0;

  constructor(options: RecordStoreOptions = {}) {
    this.schema = options.schema ?? getSchemaVersion();
    this.log = options.logger ?? defaultLogger;
  }

  get size(): number {
    return this.rows.length;
  }

  get isEmpty(): boolean {
    return this.rows.length === 0;
  }

  /** Copy of the table in insertion order. */
  snapshot(): EcmoRecord[] {
    return this.rows.map(row => ({ ...row }));
  }

  find(recordNo: number): EcmoRecord | null {
    const row = this.rows.find(r => r.recordNo === recordNo);
    return row ? { ...row } : null;
  }

  nextRecordNo(): number {
    return Math.max(maxRecordNo(this.rows), this.highWater) + 1;
  }

  /**
   * Append one record.
   * @returns the new record number
   * @throws {ValidationError} when a base field breaks the schema's rules
   */
  add(input: RecordInput): number {
    const raw: RawRow = {
      recordedAt: input.recordedAt,
      flow: input.flow,
      rpm: input.rpm,
      deltaP: input.deltaP,
      hemoglobin: input.hemoglobin,
      glucoseMmol: input.glucoseMmol ?? null,
    };
    const [record] = normalizeTable([raw], this.schema);
    const at = parseRecordedAt(input.recordedAt);
    const violations = validateRecord(raw, record, this.schema);
    if (!at) violations.unshift(timestampViolation(input.recordedAt));

    if (!at || violations.length > 0) {
      const error = new ValidationError(violations);
      this.log.warn('Record rejected', { violations: error.violations });
      throw error;
    }

    const recordNo = this.nextRecordNo();
    this.rows.push(recompute({ ...record, recordNo, recordedAt: formatIsoMinute(at) }, this.schema));
    this.highWater = recordNo;
    this.log.info('Record added', { recordNo });
    return recordNo;
  }

  /**
   * Replace the table with an edited copy. The edited rows are authoritative;
   * derived cells in them are ignored and recomputed. Rows without a number
   * get fresh ones above every number handed out so far.
   * @throws {TimestampParseError} when any RecordedAt cell does not parse
   * @throws {ValidationError} when any row breaks a base-field rule
   */
  applyEdits(edited: readonly RawRow[]): void {
    // identifiers come from the cells as given; the normalizer's 1..N back-fill
    // would hand out numbers that were already used
    const idKey = resolveInputKey(collectHeaders(edited), 'recordNo');
    const idCells = edited.map(row => (idKey !== null ? row[idKey] : undefined));
    const normalized = normalizeTable(edited, this.schema).map((record, index) => ({
      ...record,
      recordNo: normalizeIdentifier(idCells[index]),
    }));

    const parsed = normalized.map(record => ({ record, at: parseRecordedAt(record.recordedAt) }));
    const timed = parsed.filter((p): p is TimedRow => p.at !== null);
    if (timed.length !== parsed.length) {
      const failures: TimestampFailure[] = [];
      parsed.forEach((p, index) => {
        if (p.at === null) {
          failures.push({ row: index + 1, recordNo: p.record.recordNo, value: p.record.recordedAt });
        }
      });
      const error = new TimestampParseError(failures);
      this.log.warn('Table edit rejected', { failures });
      throw error;
    }

    const violations = [
      ...idCells.flatMap((cell, index) => identifierViolation(cell, index + 1) ?? []),
      ...normalized.flatMap((record, index) => validateRecord(edited[index], record, this.schema, index + 1)),
      ...duplicateIdentifierViolations(normalized),
    ];
    if (violations.length > 0) {
      const error = new ValidationError(violations);
      this.log.warn('Table edit rejected', { violations });
      throw error;
    }

    let next = Math.max(maxRecordNo(normalized), this.highWater) + 1;
    const replaced = timed.map(({ record, at }) =>
      recompute(
        { ...record, recordNo: record.recordNo ?? next++, recordedAt: formatIsoMinute(at) },
        this.schema,
      ),
    );

    this.rows = replaced;
    this.highWater = Math.max(this.highWater, maxRecordNo(replaced));
    this.log.info('Table replaced from edits', { rows: replaced.length });
  }

  /**
   * @throws {NotFoundError} when no row has this number
   */
  delete(recordNo: number): void {
    const index = this.rows.findIndex(row => row.recordNo === recordNo);
    if (index === -1) {
      this.log.warn('Delete of unknown record', { recordNo });
      throw new NotFoundError(recordNo);
    }
    this.rows.splice(index, 1);
    this.log.info('Record deleted', { recordNo });
  }

  /** Remove the most recently inserted row; nothing happens on an empty table. */
  deleteLast(): void {
    const removed = this.rows.pop();
    if (removed) {
      this.log.info('Last record deleted', { recordNo: removed.recordNo });
    }
  }

  /** Empty the table. Confirmation is the caller's job. */
  clear(): void {
    const count = this.rows.length;
    this.rows = [];
    this.highWater = 0;
    this.log.info('Table cleared', { rows: count });
  }

  /**
   * Replace the table with rows from an export of any schema version.
   * Unlike edits, rows are not checked against the base-field rules: legacy
   * rows with unusable values are kept with null derived columns.
   * @throws {SchemaMismatchError} when rows exist but none of the core columns do
   */
  restore(rows: readonly RawRow[], headers: readonly string[] = collectHeaders(rows)): RestoreSummary {
    if (rows.length > 0) {
      assertCoreColumns(headers);
    }

    const normalized = normalizeTable(rows, this.schema);
    const seen = new Set<number>();
    let next = maxRecordNo(normalized) + 1;
    let renumbered = 0;
    let unparsedTimestamps = 0;

    const restored = normalized.map(record => {
      let recordNo = record.recordNo;
      if (recordNo === null || seen.has(recordNo)) {
        recordNo = next++;
        renumbered++;
      }
      seen.add(recordNo);

      const recordedAt = canonicalRecordedAt(record.recordedAt);
      if (parseRecordedAt(recordedAt) === null) unparsedTimestamps++;

      return recompute({ ...record, recordNo, recordedAt }, this.schema);
    });

    this.rows = restored;
    this.highWater = maxRecordNo(restored);

    const summary: RestoreSummary = { rows: restored.length, renumbered, unparsedTimestamps };
    if (unparsedTimestamps > 0) {
      this.log.warn('Restored rows with unreadable timestamps', summary);
    }
    this.log.info('Table restored', summary);
    return summary;
  }
}
