/**
 * @fileoverview Metric contracts for the daily summary tiles.
 */

export type MetricUnit =
  | 'L/min'
  | 'rpm'
  | 'mmHg'
  | 'g/dL'
  | 'mmol/L'
  | 'mg/dL'
  | 'ratio';

export interface MetricContract {
  metricId: string;
  label: string;
  value: number | null;
  unit: MetricUnit;
  computedAt: string;
  nullSemantics: string;
}

export interface DailyMetric extends MetricContract {
  /** Daily-first value of the day before the latest day */
  previous: number | null;
  /** Percent change from previous to value; null when undefined */
  changePct: number | null;
}

export function buildDailyMetric(input: Omit<DailyMetric, 'computedAt'> & { computedAt?: string }): DailyMetric {
  return {
    ...input,
    computedAt: input.computedAt || new Date().toISOString(),
  };
}
