import { CellValue } from './table';

/**
 * Timestamp layouts a source system can declare.
 *
 * - iso: "2025-10-01T08:00:00Z", "2025-10-01 08:00:00", "2025-10-01"
 * - compact: "20251001", "202510010800", "20251001T080000", falling back to iso
 */
export type TimestampFormat = 'iso' | 'compact';

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const COMPACT_PATTERN = /^(\d{4})(\d{2})(\d{2})(?:T?(\d{2})(\d{2})(\d{2})?)?$/;

/**
 * Coerce a cell to trimmed text, null for blanks
 */
export function toText(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  const text = String(value).trim();
  return text === '' ? null : text;
}

/**
 * Coerce a cell to a finite number, null when it does not parse
 */
export function toNumber(value: CellValue | undefined): number | null {
  if (value === null || value === undefined || value instanceof Date) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const trimmed = value.trim();
  if (trimmed === '') return null;
  const num = Number(trimmed);
  return Number.isFinite(num) ? num : null;
}

/**
 * Parse a timestamp cell into a UTC Date.
 *
 * Values without an offset are read as UTC. Anything that does not match
 * the declared layout, or names an impossible calendar date, gives null.
 */
export function parseTimestamp(
  value: CellValue | undefined,
  format: TimestampFormat = 'iso',
): Date | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }

  const trimmed = String(value).trim();
  if (trimmed === '') return null;

  if (format === 'compact') {
    const compact = parseCompact(trimmed);
    if (compact) return compact;
  }
  return parseIso(trimmed);
}

function parseCompact(value: string): Date | null {
  const match = COMPACT_PATTERN.exec(value);
  if (!match) return null;

  const [, year, month, day, hour, minute, second] = match;
  return buildUtcDate(
    Number.parseInt(year, 10),
    Number.parseInt(month, 10),
    Number.parseInt(day, 10),
    hour ? Number.parseInt(hour, 10) : 0,
    minute ? Number.parseInt(minute, 10) : 0,
    second ? Number.parseInt(second, 10) : 0,
    0,
  );
}

function parseIso(value: string): Date | null {
  const match = ISO_PATTERN.exec(value);
  if (!match) return null;

  const [, year, month, day, hour, minute, second, fraction, zone] = match;
  const millis = fraction
    ? Number.parseInt(fraction.padEnd(3, '0').slice(0, 3), 10)
    : 0;

  const date = buildUtcDate(
    Number.parseInt(year, 10),
    Number.parseInt(month, 10),
    Number.parseInt(day, 10),
    hour ? Number.parseInt(hour, 10) : 0,
    minute ? Number.parseInt(minute, 10) : 0,
    second ? Number.parseInt(second, 10) : 0,
    millis,
  );
  if (!date) return null;

  const offsetMinutes = parseOffset(zone);
  if (offsetMinutes === null) return null;
  return new Date(date.getTime() - offsetMinutes * 60_000);
}

/**
 * Offset in minutes east of UTC; 0 for "Z" or no zone
 */
function parseOffset(zone: string | undefined): number | null {
  if (!zone || zone.toUpperCase() === 'Z') return 0;

  const match = /^([+-])(\d{2}):?(\d{2})?$/.exec(zone);
  if (!match) return null;

  const [, sign, hours, minutes] = match;
  const h = Number.parseInt(hours, 10);
  const m = minutes ? Number.parseInt(minutes, 10) : 0;
  if (h > 23 || m > 59) return null;

  const total = h * 60 + m;
  return sign === '-' ? -total : total;
}

/**
 * Date.UTC normalizes overflow (month 13, day 32); reject those instead
 */
function buildUtcDate(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  millis: number,
): Date | null {
  const date = new Date(
    Date.UTC(year, month - 1, day, hour, minute, second, millis),
  );
  if (
    Number.isNaN(date.getTime()) ||
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return null;
  }
  return date;
}
