/**
 * @fileoverview CSV import/export for the record table.
 *
 * Reads exports of any schema version into raw rows (cells kept as text, so
 * the normalizer alone decides what is numeric) and writes the active
 * version's canonical layout.
 *
 * @module lib/csv-parser
 *
 * @example
 * ```ts
 * import { parseRecordsCsv } from '@/lib/csv-parser';
 *
 * const csvText = await file.text();
 * const { headers, rows } = parseRecordsCsv(csvText);
 * store.restore(rows, headers);
 * ```
 */

import * as XLSX from 'xlsx';
import type { EcmoRecord, RawRow, SchemaVersion } from '@/types/ecmo';
import { canonicalHeaders } from './schema/columns';
import { assertCoreColumns } from './schema/validation';
import { formatIsoMinute, parseRecordedAt } from './timestamps';

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

export interface ParsedCsv {
  /** Header cells in file order, blanks removed */
  headers: string[];
  rows: RawRow[];
}

// ============================================================================
// INTERNAL HELPERS
// ============================================================================

function readGrid(csvText: string): unknown[][] {
  // raw: no value sniffing, every cell stays a string
  const workbook = XLSX.read(csvText, { type: 'string', raw: true });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) return [];
  return XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });
}

function formatCell(value: number | string | null): string {
  if (value === null) return '';
  return String(value);
}

function formatTimestampCell(value: string | null): string {
  if (value === null) return '';
  const parsed = parseRecordedAt(value);
  return parsed ? formatIsoMinute(parsed) : value;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Parse CSV text into header names and rows keyed by header.
 * A leading byte-order mark is ignored; an empty file gives no headers and no rows.
 */
export function parseRecordsCsv(csvText: string): ParsedCsv {
  const text = csvText.replace(/^\uFEFF/, '');
  if (!text.trim()) return { headers: [], rows: [] };

  const [headerRow = [], ...body] = readGrid(text);
  const headerCells = headerRow.map(cell => (cell === null || cell === undefined ? '' : String(cell).trim()));

  const rows = body.map(cells => {
    const row: RawRow = {};
    headerCells.forEach((header, index) => {
      if (header) row[header] = cells[index] ?? null;
    });
    return row;
  });

  return { headers: headerCells.filter(Boolean), rows };
}

/**
 * Parse and check that the file carries at least one of the core columns.
 * @throws {SchemaMismatchError} when none of RecordedAt, Flow, RPM, DeltaP is present
 */
export function parseRecordsCsvStrict(csvText: string): ParsedCsv {
  const parsed = parseRecordsCsv(csvText);
  assertCoreColumns(parsed.headers);
  return parsed;
}

/**
 * Write records in the schema's canonical column order. Timestamps use
 * `YYYY-MM-DDTHH:MM`; missing values are empty cells.
 */
export function exportRecordsCsv(records: readonly EcmoRecord[], schema: SchemaVersion): string {
  const aoa: string[][] = [
    canonicalHeaders(schema),
    ...records.map(record =>
      schema.columns.map(column =>
        column.field === 'recordedAt'
          ? formatTimestampCell(record.recordedAt)
          : formatCell(record[column.field]),
      ),
    ),
  ];
  const sheet = XLSX.utils.aoa_to_sheet(aoa);
  return XLSX.utils.sheet_to_csv(sheet);
}

const pad2 = (n: number) => String(n).padStart(2, '0');

/** `ecmo_records_YYYYMMDD_HHMM.csv`, stamped with the host's local time */
export function exportFileName(now: Date = new Date()): string {
  const day = `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}`;
  const time = `${pad2(now.getHours())}${pad2(now.getMinutes())}`;
  return `ecmo_records_${day}_${time}.csv`;
}
