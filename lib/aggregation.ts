/**
 * @fileoverview Time ordering and windowing over a snapshot of the record table.
 *
 * All functions are read-only: they never modify the records they receive.
 *
 * @module lib/aggregation
 */

import type { EcmoRecord, NumericField } from '@/types/ecmo';
import { isDefined, mean } from './calculations/numeric-policy';
import { MS_PER_DAY, calendarDate, calendarDaysBetween, parseRecordedAt } from './timestamps';

export interface TimedRecord {
  at: Date;
  record: EcmoRecord;
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive whole number (received ${value})`);
  }
}

/**
 * Rows with a readable timestamp, oldest first. Rows whose timestamp does not
 * parse are dropped; rows with equal timestamps keep their table order.
 */
export function timeOrdered(records: readonly EcmoRecord[]): TimedRecord[] {
  return records
    .map((record, index) => ({ record, index, at: parseRecordedAt(record.recordedAt) }))
    .filter((entry): entry is { record: EcmoRecord; index: number; at: Date } => entry.at !== null)
    .sort((a, b) => {
      const cmp = a.at.getTime() - b.at.getTime();
      if (cmp !== 0) return cmp;
      return a.index - b.index;
    })
    .map(({ at, record }) => ({ at, record }));
}

/** The earliest row of each calendar day, days ascending. */
export function dailyFirst(records: readonly EcmoRecord[]): TimedRecord[] {
  const firstByDay = new Map<string, TimedRecord>();
  for (const entry of timeOrdered(records)) {
    const day = calendarDate(entry.at);
    if (!firstByDay.has(day)) firstByDay.set(day, entry);
  }
  return [...firstByDay.values()];
}

/**
 * Time-ordered rows recorded at or after `referenceTime - days`.
 * `referenceTime` defaults to the latest timestamp in the table.
 */
export function lastNDays(records: readonly EcmoRecord[], days: number, referenceTime?: Date): TimedRecord[] {
  assertPositiveInteger('days', days);
  const ordered = timeOrdered(records);
  if (ordered.length === 0) return [];

  const reference = referenceTime ?? ordered[ordered.length - 1].at;
  const threshold = reference.getTime() - days * MS_PER_DAY;
  return ordered.filter(entry => entry.at.getTime() >= threshold);
}

/**
 * Trailing mean: position i averages positions max(0, i - window + 1)..i.
 * Missing values inside a window are skipped; a window with no values gives null.
 */
export function rollingMean(values: readonly (number | null)[], window: number): (number | null)[] {
  assertPositiveInteger('window', window);
  return values.map((_, i) => {
    const slice = values.slice(Math.max(0, i - window + 1), i + 1).filter(isDefined);
    return mean(slice);
  });
}

export function rollingFieldMean(
  sequence: readonly TimedRecord[],
  field: NumericField,
  window: number,
): (number | null)[] {
  return rollingMean(sequence.map(entry => entry.record[field]), window);
}

/**
 * Day number of the latest record counted from the first record's day (1-based).
 * Null for a table without any readable timestamp.
 */
export function dayIndex(records: readonly EcmoRecord[]): number | null {
  const days = dailyFirst(records);
  if (days.length === 0) return null;
  return calendarDaysBetween(days[0].at, days[days.length - 1].at) + 1;
}

/** (current - previous) / |previous| * 100; null when previous is 0 or either side is missing. */
export function percentChange(previous: number | null, current: number | null): number | null {
  if (!isDefined(previous) || !isDefined(current) || previous === 0) return null;
  return ((current - previous) / Math.abs(previous)) * 100;
}
