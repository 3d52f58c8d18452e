import { parseTimestamp, toNumber, toText } from '../common/coercion';
import { compositeKey, createTable, Row, Table } from '../common/table';
import {
  UNKNOWN_SERVICE_POINT,
  UNKNOWN_SOURCE,
} from '../standardization/dto/canonical.dto';

/**
 * Calendar granularity of a usage summary. Buckets are aligned to UTC
 * calendar boundaries; weeks start on Monday.
 */
export type UsageWindow = 'hourly' | 'daily' | 'weekly' | 'monthly';

export const USAGE_WINDOWS: readonly UsageWindow[] = [
  'hourly',
  'daily',
  'weekly',
  'monthly',
];

export const DEFAULT_USAGE_WINDOW: UsageWindow = 'daily';

const WINDOW_ALIASES: Readonly<Record<string, UsageWindow>> = {
  h: 'hourly',
  hourly: 'hourly',
  d: 'daily',
  daily: 'daily',
  w: 'weekly',
  weekly: 'weekly',
  m: 'monthly',
  monthly: 'monthly',
};

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export interface UsageSummaryRecord {
  sourceTag: string;
  servicePointId: string;
  bucketStart: Date;
  /** Last millisecond inside the bucket */
  bucketEnd: Date;
  totalUsage: number;
  /** Readings with a numeric value */
  intervalCount: number;
  peakUsageValue: number | null;
  peakUsageTs: Date | null;
  pitUsageValue: number | null;
  pitUsageTs: Date | null;
}

export const USAGE_SUMMARY_COLUMNS = [
  'sourceTag',
  'servicePointId',
  'bucketStart',
  'bucketEnd',
  'totalUsage',
  'intervalCount',
  'peakUsageValue',
  'peakUsageTs',
  'pitUsageValue',
  'pitUsageTs',
] as const satisfies readonly (keyof UsageSummaryRecord)[];

/**
 * Resolve a window name or its one-letter alias (H, D, W, M).
 * Returns null for anything else, including non-string query values.
 */
export function parseUsageWindow(value: unknown): UsageWindow | null {
  if (typeof value !== 'string') return null;
  const key = value.trim().toLowerCase();
  return Object.hasOwn(WINDOW_ALIASES, key) ? WINDOW_ALIASES[key] : null;
}

/**
 * Calendar bucket containing `ts`
 */
export function bucketBounds(
  ts: Date,
  window: UsageWindow,
): { start: Date; end: Date } {
  const year = ts.getUTCFullYear();
  const month = ts.getUTCMonth();
  const day = ts.getUTCDate();

  let start: number;
  let next: number;
  switch (window) {
    case 'hourly':
      start = Date.UTC(year, month, day, ts.getUTCHours());
      next = start + HOUR_MS;
      break;
    case 'daily':
      start = Date.UTC(year, month, day);
      next = start + DAY_MS;
      break;
    case 'weekly': {
      const daysSinceMonday = (ts.getUTCDay() + 6) % 7;
      start = Date.UTC(year, month, day - daysSinceMonday);
      next = start + 7 * DAY_MS;
      break;
    }
    case 'monthly':
      start = Date.UTC(year, month, 1);
      next = Date.UTC(year, month + 1, 1);
      break;
  }

  return { start: new Date(start), end: new Date(next - 1) };
}

interface Extreme {
  value: number;
  ts: Date;
}

interface SummaryGroup {
  sourceTag: string;
  servicePointId: string;
  bucketStart: Date;
  bucketEnd: Date;
  totalUsage: number;
  intervalCount: number;
  peak: Extreme | null;
  pit: Extreme | null;
}

/**
 * Bucket usage records per (sourceTag, servicePointId, calendar window).
 *
 * Rows without a parsable interval start are dropped. Null values do not
 * count towards total, count, peak or trough; peak and trough keep the
 * first row holding the extreme value.
 */
export function summarizeUsage(
  usage: Table<Row>,
  window: UsageWindow = DEFAULT_USAGE_WINDOW,
): Table<UsageSummaryRecord> {
  const groups = new Map<string, SummaryGroup>();

  for (const row of usage.rows) {
    const start = parseTimestamp(row.intervalStartTs ?? null);
    if (!start) continue;

    const sourceTag = toText(row.sourceTag) ?? UNKNOWN_SOURCE;
    const servicePointId = toText(row.servicePointId) ?? UNKNOWN_SERVICE_POINT;
    const bucket = bucketBounds(start, window);
    const key = compositeKey([sourceTag, servicePointId, bucket.start]);

    let group = groups.get(key);
    if (!group) {
      group = {
        sourceTag,
        servicePointId,
        bucketStart: bucket.start,
        bucketEnd: bucket.end,
        totalUsage: 0,
        intervalCount: 0,
        peak: null,
        pit: null,
      };
      groups.set(key, group);
    }

    const value = toNumber(row.value);
    if (value === null) continue;

    group.totalUsage += value;
    group.intervalCount++;
    if (!group.peak || value > group.peak.value) {
      group.peak = { value, ts: start };
    }
    if (!group.pit || value < group.pit.value) {
      group.pit = { value, ts: start };
    }
  }

  const rows = [...groups.values()].sort(compareGroups).map(
    (group): UsageSummaryRecord => ({
      sourceTag: group.sourceTag,
      servicePointId: group.servicePointId,
      bucketStart: group.bucketStart,
      bucketEnd: group.bucketEnd,
      totalUsage: group.totalUsage,
      intervalCount: group.intervalCount,
      peakUsageValue: group.peak?.value ?? null,
      peakUsageTs: group.peak?.ts ?? null,
      pitUsageValue: group.pit?.value ?? null,
      pitUsageTs: group.pit?.ts ?? null,
    }),
  );

  return createTable<UsageSummaryRecord>(USAGE_SUMMARY_COLUMNS, rows);
}

function compareGroups(a: SummaryGroup, b: SummaryGroup): number {
  return (
    compareText(a.sourceTag, b.sourceTag) ||
    compareText(a.servicePointId, b.servicePointId) ||
    a.bucketStart.getTime() - b.bucketStart.getTime()
  );
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
