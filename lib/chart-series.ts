/**
 * @fileoverview Series and ECharts options for the trend and scatter views.
 *
 * The renderer only needs ordered `[timestamp, value]` or `[x, y]` pairs;
 * the option builders wrap those pairs in the styling the views use.
 *
 * @module lib/chart-series
 */

import type { EChartsOption, LineSeriesOption, ScatterSeriesOption } from 'echarts';
import type { AnalysisResult, EcmoRecord, NumericField, TimePoint, XYPoint } from '@/types/ecmo';
import { dailyFirst, lastNDays, rollingMean, timeOrdered, type TimedRecord } from './aggregation';
import { completePairs } from './correlation';
import { isDefined } from './calculations/numeric-policy';
import { COLUMN_DEFINITIONS } from './schema/columns';
import { formatIsoMinute } from './timestamps';

export const MIN_TREND_POINTS = 2;

export interface TrendSeries {
  field: NumericField;
  window: number;
  raw: TimePoint[];
  smoothed: TimePoint[];
}

function toTimePoints(sequence: readonly TimedRecord[], field: NumericField): TimePoint[] {
  const points: TimePoint[] = [];
  for (const { at, record } of sequence) {
    const value = record[field];
    if (isDefined(value)) points.push([formatIsoMinute(at), value]);
  }
  return points;
}

function axisName(field: NumericField): string {
  const def = COLUMN_DEFINITIONS[field];
  return def.unit ? `${def.label} (${def.unit})` : def.label;
}

/**
 * Time-ordered values of one field with their trailing rolling mean.
 * Rows without the value are skipped before smoothing.
 */
export function trendSeries(
  records: readonly EcmoRecord[],
  field: NumericField,
  window: number,
): AnalysisResult<TrendSeries> {
  const raw = toTimePoints(timeOrdered(records), field);
  if (raw.length < MIN_TREND_POINTS) {
    return {
      status: 'insufficient-data',
      required: MIN_TREND_POINTS,
      available: raw.length,
      message: `Need at least ${MIN_TREND_POINTS} timed values of ${COLUMN_DEFINITIONS[field].label} to draw a trend`,
    };
  }

  const means = rollingMean(raw.map(([, value]) => value), window);
  const smoothed: TimePoint[] = [];
  raw.forEach(([time], index) => {
    const value = means[index];
    if (isDefined(value)) smoothed.push([time, value]);
  });

  return { status: 'ok', value: { field, window, raw, smoothed } };
}

/** One point per calendar day (its first record), optionally only the last `days` days. */
export function dailySeries(records: readonly EcmoRecord[], field: NumericField, days?: number): TimePoint[] {
  const firsts = dailyFirst(records);
  if (days === undefined || firsts.length === 0) return toTimePoints(firsts, field);

  // measure the window from the latest record, not the latest day's first record
  const ordered = timeOrdered(records);
  const windowed = lastNDays(
    firsts.map(entry => entry.record),
    days,
    ordered[ordered.length - 1].at,
  );
  return toTimePoints(windowed, field);
}

export function scatterPairs(records: readonly EcmoRecord[], x: NumericField, y: NumericField): XYPoint[] {
  return completePairs(records, x, y);
}

// ============================================================================
// ECHARTS OPTIONS
// ============================================================================

export function buildTrendSeries(trend: TrendSeries): LineSeriesOption[] {
  const label = COLUMN_DEFINITIONS[trend.field].label;
  return [
    {
      name: `${label} raw`,
      type: 'line',
      data: trend.raw,
      showSymbol: false,
      lineStyle: { type: 'dashed', opacity: 0.35 },
    },
    {
      name: `${label} smoothed (window=${trend.window})`,
      type: 'line',
      data: trend.smoothed,
      symbol: 'circle',
      lineStyle: { type: 'solid' },
    },
  ];
}

export function buildTrendOption(trend: TrendSeries, title?: string): EChartsOption {
  const series = buildTrendSeries(trend);
  return {
    title: { text: title ?? `${COLUMN_DEFINITIONS[trend.field].label} trend` },
    tooltip: { trigger: 'axis' },
    legend: { data: series.map(s => String(s.name)) },
    xAxis: { type: 'time', name: 'Time' },
    yAxis: { type: 'value', name: axisName(trend.field) },
    series,
  };
}

export function buildScatterSeries(pairs: readonly XYPoint[], x: NumericField, y: NumericField): ScatterSeriesOption {
  return {
    name: `${COLUMN_DEFINITIONS[y].label} vs ${COLUMN_DEFINITIONS[x].label}`,
    type: 'scatter',
    data: pairs.map(([xv, yv]) => [xv, yv]),
    symbolSize: 8,
  };
}

export function buildScatterOption(pairs: readonly XYPoint[], x: NumericField, y: NumericField): EChartsOption {
  return {
    tooltip: { trigger: 'item' },
    xAxis: { type: 'value', name: axisName(x), scale: true },
    yAxis: { type: 'value', name: axisName(y), scale: true },
    series: [buildScatterSeries(pairs, x, y)],
  };
}
