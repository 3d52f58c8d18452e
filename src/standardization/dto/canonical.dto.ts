/**
 * Canonical Model
 *
 * The unified cross-utility schema every source system is mapped into.
 * Column lists fix the order in which reporting consumers see fields.
 */

/**
 * A physical premise where usage is measured.
 * Unique per (sourceTag, servicePointId) after reconciliation.
 */
export interface ServicePointRecord {
  sourceTag: string;
  servicePointId: string;
  /** External/account-facing number, when the utility exposes one */
  servicePointNumber: string | null;
  houseNum: string | null;
  street: string | null;
  /** Unit / suppression suffix of the house number */
  houseSupp: string | null;
  city: string | null;
  zip: string | null;
  /** State or region */
  state: string | null;
  installedAt: Date | null;
  removedAt: Date | null;
  createdAt: Date | null;
  updatedAt: Date | null;
}

/**
 * A physical measuring device.
 * Unique per (sourceTag, meterId) after reconciliation.
 */
export interface MeterRecord {
  sourceTag: string;
  meterId: string;
  serialNumber: string | null;
  meterType: string | null;
  /** Category or channel, depending on the utility */
  meterCategory: string | null;
  /** Null when the utility does not expose the meter-to-premise link */
  servicePointId: string | null;
  installedAt: Date | null;
  removedAt: Date | null;
  createdAt: Date | null;
  updatedAt: Date | null;
}

/**
 * One measured value over a time span.
 * intervalEndTs is derived as intervalStartTs + durationSeconds.
 */
export interface IntervalRecord {
  sourceTag: string;
  servicePointId: string | null;
  meterId: string | null;
  intervalStartTs: Date | null;
  intervalEndTs: Date | null;
  durationSeconds: number | null;
  value: number | null;
  quality: string | null;
  channel: string | null;
  lastUpdateTime: Date | null;
  exportedAt: Date | null;
}

export const SERVICE_POINT_COLUMNS = [
  'sourceTag',
  'servicePointId',
  'servicePointNumber',
  'houseNum',
  'street',
  'houseSupp',
  'city',
  'zip',
  'state',
  'installedAt',
  'removedAt',
  'createdAt',
  'updatedAt',
] as const satisfies readonly (keyof ServicePointRecord)[];

export const METER_COLUMNS = [
  'sourceTag',
  'meterId',
  'serialNumber',
  'meterType',
  'meterCategory',
  'servicePointId',
  'installedAt',
  'removedAt',
  'createdAt',
  'updatedAt',
] as const satisfies readonly (keyof MeterRecord)[];

export const INTERVAL_COLUMNS = [
  'sourceTag',
  'servicePointId',
  'meterId',
  'intervalStartTs',
  'intervalEndTs',
  'durationSeconds',
  'value',
  'quality',
  'channel',
  'lastUpdateTime',
  'exportedAt',
] as const satisfies readonly (keyof IntervalRecord)[];

/**
 * Records as produced by a single adapter, before reconciliation has
 * filled the source tag and dropped rows without an identifier.
 */
type Staged<T, K extends keyof T> = Omit<T, K> & { [P in K]: T[P] | null };

export type StagedServicePoint = Staged<
  ServicePointRecord,
  'sourceTag' | 'servicePointId'
>;
export type StagedMeter = Staged<MeterRecord, 'sourceTag' | 'meterId'>;
export type StagedInterval = Staged<IntervalRecord, 'sourceTag'>;

/** Canonical fields an adapter maps for each entity */
export type ServicePointField = keyof ServicePointRecord;
export type MeterField = keyof MeterRecord;
/** intervalEndTs is derived, never mapped */
export type IntervalField = Exclude<keyof IntervalRecord, 'intervalEndTs'>;

/** Fallback markers used when an identifier cannot be resolved */
export const UNKNOWN_SOURCE = 'UNKNOWN_UTILITY';
export const UNKNOWN_SERVICE_POINT = 'UNKNOWN_SERVICE_POINT';
