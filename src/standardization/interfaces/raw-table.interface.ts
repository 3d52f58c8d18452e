/**
 * Raw tables as handed over by the landing layer.
 *
 * Column names and cell formatting are whatever the source system
 * exported; the standardization layer normalizes both.
 */
export type RawCell = string | number | null | undefined;

export interface RawTable {
  columns: string[];
  rows: Array<Record<string, RawCell>>;
}

/** Entity tables every source system must supply */
export type RawEntity = 'servicePoints' | 'meters' | 'intervals';

export const RAW_ENTITIES: readonly RawEntity[] = [
  'servicePoints',
  'meters',
  'intervals',
];

/** File/table name of each entity in a source export */
export const RAW_TABLE_NAMES: Record<RawEntity, string> = {
  servicePoints: 'service_points',
  meters: 'meters',
  intervals: 'intervals',
};

export type RawSourceTables = Partial<Record<RawEntity, RawTable>>;

/** Raw tables keyed by source adapter name (e.g. "utility1") */
export type RawDataset = Record<string, RawSourceTables>;
