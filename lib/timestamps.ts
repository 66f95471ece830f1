/**
 * @fileoverview Minute-resolution timestamp helpers.
 *
 * Recorded times are bedside wall-clock readings. They are held as UTC-based
 * `Date` values so that calendar-day grouping never shifts with the host's
 * time zone.
 *
 * @module lib/timestamps
 */

const MS_PER_MINUTE = 60_000;
export const MS_PER_DAY = 86_400_000;

// YYYY-MM-DD, then optional T/space + HH:MM with optional seconds/fraction/Z
const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?Z?)?$/;

/**
 * Parse a recorded-at value. Accepts `YYYY-MM-DD HH:MM`, `YYYY-MM-DDTHH:MM`,
 * the same with seconds, or a bare date (midnight). Seconds are dropped.
 *
 * A `Date` is read through its UTC fields: pass one built with `Date.UTC`
 * from the wall-clock reading, not a local-time `Date`.
 */
export function parseRecordedAt(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : truncateToMinute(value);
  }
  if (typeof value !== 'string') return null;

  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const hour = match[4] !== undefined ? Number(match[4]) : 0;
  const minute = match[5] !== undefined ? Number(match[5]) : 0;

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute));
  // Reject overflow such as 2024-02-30 or 25:00
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute
  ) {
    return null;
  }
  return date;
}

/** Combine the form's separate date and time inputs. */
export function combineDateAndTime(date: string, time: string): Date | null {
  return parseRecordedAt(`${date.trim()} ${time.trim()}`);
}

function truncateToMinute(date: Date): Date {
  return new Date(Math.floor(date.getTime() / MS_PER_MINUTE) * MS_PER_MINUTE);
}

/** `YYYY-MM-DDTHH:MM`, the stored and exported form */
export function formatIsoMinute(date: Date): string {
  return date.toISOString().slice(0, 16);
}

/** `YYYY-MM-DD HH:MM`, the display and edit form */
export function formatDisplay(date: Date): string {
  return formatIsoMinute(date).replace('T', ' ');
}

/** `YYYY-MM-DD` */
export function calendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Whole calendar days from `from` to `to` */
export function calendarDaysBetween(from: Date, to: Date): number {
  const start = Date.UTC(from.getUTCFullYear(), from.getUTCMonth(), from.getUTCDate());
  const end = Date.UTC(to.getUTCFullYear(), to.getUTCMonth(), to.getUTCDate());
  return Math.round((end - start) / MS_PER_DAY);
}

/** Canonical stored form of a timestamp cell, or the trimmed text if it does not parse. */
export function canonicalRecordedAt(value: string | null): string | null {
  if (value === null) return null;
  const parsed = parseRecordedAt(value);
  return parsed ? formatIsoMinute(parsed) : value;
}
