/**
 * @fileoverview Correlation between two record columns.
 *
 * The statistics themselves come from an injected provider; this module picks
 * the columns, removes incomplete pairs and refuses to ask the provider when
 * there are too few pairs left.
 *
 * @module lib/correlation
 */

import type {
  AnalysisResult,
  CorrelationProvider,
  CorrelationStatistics,
  EcmoRecord,
  NumericField,
  SchemaVersion,
  XYPoint,
} from '@/types/ecmo';
import { isDefined } from './calculations/numeric-policy';
import { COLUMN_DEFINITIONS, hasField } from './schema/columns';

export const MIN_CORRELATION_PAIRS = 3;

export interface CorrelationPair {
  x: NumericField;
  y: NumericField;
}

export interface CorrelationReport {
  x: NumericField;
  y: NumericField;
  n: number;
  statistics: CorrelationStatistics;
}

/** Column pairs shown on the analysis page. */
export const STANDARD_CORRELATION_PAIRS: CorrelationPair[] = [
  { x: 'hemoglobin', y: 'r' },
  { x: 'flow', y: 'deltaP' },
  { x: 'rpm', y: 'flow' },
  { x: 'hemoglobin', y: 'rPerHb' },
  { x: 'glucoseMmol', y: 'r' },
];

export function correlationPairsFor(schema: SchemaVersion): CorrelationPair[] {
  return STANDARD_CORRELATION_PAIRS.filter(pair => hasField(schema, pair.x) && hasField(schema, pair.y));
}

/** Rows where both values are present, in table order. */
export function completePairs(records: readonly EcmoRecord[], x: NumericField, y: NumericField): XYPoint[] {
  const pairs: XYPoint[] = [];
  for (const record of records) {
    const xv = record[x];
    const yv = record[y];
    if (isDefined(xv) && isDefined(yv)) pairs.push([xv, yv]);
  }
  return pairs;
}

export function correlate(
  records: readonly EcmoRecord[],
  x: NumericField,
  y: NumericField,
  provider: CorrelationProvider,
): AnalysisResult<CorrelationReport> {
  const pairs = completePairs(records, x, y);
  if (pairs.length < MIN_CORRELATION_PAIRS) {
    return {
      status: 'insufficient-data',
      required: MIN_CORRELATION_PAIRS,
      available: pairs.length,
      message: `Need at least ${MIN_CORRELATION_PAIRS} rows with both ${COLUMN_DEFINITIONS[x].label} and ${COLUMN_DEFINITIONS[y].label} (have ${pairs.length})`,
    };
  }

  const statistics = provider(
    pairs.map(([xv]) => xv),
    pairs.map(([, yv]) => yv),
  );
  return { status: 'ok', value: { x, y, n: pairs.length, statistics } };
}
