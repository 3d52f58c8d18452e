import { Logger } from '@nestjs/common';
import {
  parseTimestamp,
  TimestampFormat,
  toNumber,
  toText,
} from '../../common/coercion';
import {
  IntervalField,
  MeterField,
  ServicePointField,
  StagedInterval,
  StagedMeter,
  StagedServicePoint,
} from '../dto/canonical.dto';
import { RAW_TABLE_NAMES, RawTable } from '../interfaces/raw-table.interface';
import {
  ISourceAdapter,
  ServicePointLinkage,
} from '../interfaces/source-adapter.interface';
import {
  applyMapping,
  FieldMapping,
  MappedRow,
  MappedValue,
} from '../mapping/field-mapping';

/**
 * Base class for adapters described entirely by field mappings.
 *
 * Subclasses declare one mapping per entity plus the timestamp layout of
 * the export; this class applies the mappings and coerces values into
 * canonical types (text, numbers, UTC dates).
 */
export abstract class MappedSourceAdapter implements ISourceAdapter {
  protected readonly logger = new Logger(this.constructor.name);

  abstract readonly name: string;
  abstract readonly sourceTag: string;
  abstract readonly description: string;
  abstract readonly idPrefixes: readonly string[];
  abstract readonly servicePointLinkage: ServicePointLinkage;

  /** Layout of interval start timestamps */
  protected abstract readonly timestampFormat: TimestampFormat;

  protected abstract readonly servicePointMapping: FieldMapping<ServicePointField>;
  protected abstract readonly meterMapping: FieldMapping<MeterField>;
  protected abstract readonly intervalMapping: FieldMapping<IntervalField>;

  mapServicePoints(raw: RawTable): StagedServicePoint[] {
    const rows = applyMapping(raw, this.servicePointMapping, {
      source: this.name,
      table: RAW_TABLE_NAMES.servicePoints,
    });
    this.logger.debug(`Mapped ${rows.length} service point rows`);
    return rows.map((get) => this.toServicePoint(get));
  }

  mapMeters(raw: RawTable): StagedMeter[] {
    const rows = applyMapping(raw, this.meterMapping, {
      source: this.name,
      table: RAW_TABLE_NAMES.meters,
    });
    this.logger.debug(`Mapped ${rows.length} meter rows`);
    return rows.map((get) => this.toMeter(get));
  }

  mapIntervals(raw: RawTable): StagedInterval[] {
    const rows = applyMapping(raw, this.intervalMapping, {
      source: this.name,
      table: RAW_TABLE_NAMES.intervals,
    });

    const intervals = rows.map((get) => this.toInterval(get));
    const unparsable = intervals.filter(
      (i) => i.intervalStartTs === null,
    ).length;
    if (unparsable > 0) {
      this.logger.warn(
        `${unparsable}/${intervals.length} interval rows have no parsable start timestamp`,
      );
    }
    return intervals;
  }

  private toServicePoint(
    get: MappedRow<ServicePointField>,
  ): StagedServicePoint {
    return {
      sourceTag: toText(get('sourceTag')),
      servicePointId: toText(get('servicePointId')),
      servicePointNumber: toText(get('servicePointNumber')),
      houseNum: toText(get('houseNum')),
      street: toText(get('street')),
      houseSupp: toText(get('houseSupp')),
      city: toText(get('city')),
      zip: toText(get('zip')),
      state: toText(get('state')),
      installedAt: this.toTimestamp(get('installedAt')),
      removedAt: this.toTimestamp(get('removedAt')),
      createdAt: this.toTimestamp(get('createdAt')),
      updatedAt: this.toTimestamp(get('updatedAt')),
    };
  }

  private toMeter(get: MappedRow<MeterField>): StagedMeter {
    return {
      sourceTag: toText(get('sourceTag')),
      meterId: toText(get('meterId')),
      serialNumber: toText(get('serialNumber')),
      meterType: toText(get('meterType')),
      meterCategory: toText(get('meterCategory')),
      servicePointId: toText(get('servicePointId')),
      installedAt: this.toTimestamp(get('installedAt')),
      removedAt: this.toTimestamp(get('removedAt')),
      createdAt: this.toTimestamp(get('createdAt')),
      updatedAt: this.toTimestamp(get('updatedAt')),
    };
  }

  private toInterval(get: MappedRow<IntervalField>): StagedInterval {
    const intervalStartTs = this.toTimestamp(get('intervalStartTs'));
    const durationSeconds = toNumber(get('durationSeconds'));

    return {
      sourceTag: toText(get('sourceTag')),
      servicePointId: toText(get('servicePointId')),
      meterId: toText(get('meterId')),
      intervalStartTs,
      intervalEndTs: deriveIntervalEnd(intervalStartTs, durationSeconds),
      durationSeconds,
      value: toNumber(get('value')),
      quality: toText(get('quality')),
      channel: toText(get('channel')),
      lastUpdateTime: this.toTimestamp(get('lastUpdateTime')),
      exportedAt: this.toTimestamp(get('exportedAt')),
    };
  }

  private toTimestamp(value: MappedValue): Date | null {
    return parseTimestamp(value, this.timestampFormat);
  }
}

/**
 * End = start + duration; a missing duration counts as zero seconds
 */
export function deriveIntervalEnd(
  start: Date | null,
  durationSeconds: number | null,
): Date | null {
  if (!start) return null;
  return new Date(start.getTime() + (durationSeconds ?? 0) * 1000);
}
