import { DateTime } from 'luxon';

/**
 * Parses a store or calendar timestamp into the UTC instant it names.
 * Offsets are applied; strings without a zone are read as UTC.
 * Postgres `::text` output (space separator, `+HH` offsets) goes through
 * the SQL parser. Returns null for anything unparseable.
 */
export function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }
  if (typeof value !== 'string') return null;

  const text = value.trim();
  let dt = DateTime.fromISO(text, { zone: 'utc' });
  if (!dt.isValid) dt = DateTime.fromSQL(text, { zone: 'utc' });
  return dt.isValid ? dt.toJSDate() : null;
}

export function subtractDays(from: Date, days: number): Date {
  return DateTime.fromJSDate(from, { zone: 'utc' }).minus({ days }).toJSDate();
}
