import { createTable, leftJoin, Row, Table, toRowTable } from '../common/table';
import {
  IntervalRecord,
  MeterRecord,
  ServicePointRecord,
  UNKNOWN_SOURCE,
} from '../standardization/dto/canonical.dto';
import { maskPii } from './access-filter';

/**
 * One interval reading joined with its meter and service point.
 * Passthrough columns vary with the join inputs, so rows stay loosely typed.
 */
export type UsageRecord = Row;

/** Leading columns of every usage table */
export const USAGE_COLUMNS = [
  'sourceTag',
  'servicePointId',
  'meterId',
  'intervalStartTs',
  'intervalEndTs',
  'durationSeconds',
  'value',
  'channel',
  'quality',
] as const;

/** Service point address columns, after the usage columns */
export const LOCATION_COLUMNS = [
  'houseNum',
  'street',
  'houseSupp',
  'city',
  'zip',
  'state',
] as const;

/** Appended to meter columns whose name the reading already uses */
export const METER_SUFFIX = 'Meter';
/** Appended to service point columns whose name is already taken */
export const SERVICE_POINT_SUFFIX = 'ServicePoint';

/**
 * Join readings -> meters -> service points and mask the result.
 *
 * Both joins are left outer: a reading without a known meter or service
 * point still yields one row, with the missing side's columns null.
 * Orphans are not an error here; the data-quality report counts them.
 */
export function buildUsageRecords(
  servicePoints: Table<ServicePointRecord>,
  meters: Table<MeterRecord>,
  intervals: Table<IntervalRecord>,
  accessLevel?: unknown,
): Table<UsageRecord> {
  const withMeters = leftJoin(
    toRowTable(intervals),
    toRowTable(meters),
    ['sourceTag', 'meterId'],
    METER_SUFFIX,
  );
  const joined = leftJoin(
    withMeters,
    toRowTable(servicePoints),
    ['sourceTag', 'servicePointId'],
    SERVICE_POINT_SUFFIX,
  );

  const rows = joined.rows.map((row) => ({
    ...row,
    sourceTag: row.sourceTag ?? UNKNOWN_SOURCE,
  }));

  return maskPii(
    createTable<UsageRecord>(orderUsageColumns(joined.columns), rows),
    accessLevel,
  );
}

/**
 * Usage columns, then location columns, then everything else in join order
 */
export function orderUsageColumns(columns: readonly string[]): string[] {
  const present = new Set(columns);
  const leading: string[] = [...USAGE_COLUMNS, ...LOCATION_COLUMNS].filter(
    (column) => present.has(column),
  );
  const placed = new Set(leading);
  return [...leading, ...columns.filter((column) => !placed.has(column))];
}
