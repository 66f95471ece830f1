/**
 * @fileoverview Day-over-day summary of the circuit metrics.
 *
 * Each day is represented by its first record; the tiles compare the latest
 * day with the day before it.
 *
 * @module lib/metrics/daily-summary
 */

import type { EcmoRecord, NumericField, SchemaVersion } from '@/types/ecmo';
import { dailyFirst, dayIndex, percentChange } from '../aggregation';
import { getDerivedMetricDefinition } from '../calculations/registry';
import { COLUMN_DEFINITIONS } from '../schema/columns';
import { calendarDate } from '../timestamps';
import { buildDailyMetric, type DailyMetric, type MetricUnit } from './contracts';

export interface DailySummary {
  /** Day number of the latest record, 1-based; null without timed records */
  dayIndex: number | null;
  recordCount: number;
  /** Calendar date (YYYY-MM-DD) of the latest day, if any */
  latestDay: string | null;
  metrics: DailyMetric[];
}

const UNITS: readonly MetricUnit[] = ['L/min', 'rpm', 'mmHg', 'g/dL', 'mmol/L', 'mg/dL'];

function unitOf(field: NumericField): MetricUnit {
  const unit = COLUMN_DEFINITIONS[field].unit;
  return UNITS.find(u => u === unit) ?? 'ratio';
}

function nullSemanticsOf(field: NumericField): string {
  if (field === 'glucoseMgdl' || field === 'r' || field === 'rPerHb' || field === 'rpmPerFlow') {
    return getDerivedMetricDefinition(field)?.nullSemantics ?? 'Null when not computable.';
  }
  return 'Null when not recorded on that day.';
}

export function buildDailySummary(
  records: readonly EcmoRecord[],
  schema: SchemaVersion,
  computedAt?: string,
): DailySummary {
  const days = dailyFirst(records);
  const latest = days.length > 0 ? days[days.length - 1] : null;
  const previous = days.length > 1 ? days[days.length - 2] : null;

  const metrics: DailyMetric[] = [];
  for (const column of schema.columns) {
    const field = column.field;
    if (field === 'recordNo' || field === 'recordedAt') continue;

    const value = latest ? latest.record[field] : null;
    const prior = previous ? previous.record[field] : null;
    metrics.push(
      buildDailyMetric({
        metricId: column.header,
        label: column.label,
        value,
        unit: unitOf(field),
        nullSemantics: nullSemanticsOf(field),
        previous: prior,
        changePct: percentChange(prior, value),
        computedAt,
      }),
    );
  }

  return {
    dayIndex: dayIndex(records),
    recordCount: records.length,
    latestDay: latest ? calendarDate(latest.at) : null,
    metrics,
  };
}
