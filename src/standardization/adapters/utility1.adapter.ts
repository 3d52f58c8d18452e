import { Injectable } from '@nestjs/common';
import { TimestampFormat } from '../../common/coercion';
import {
  IntervalField,
  MeterField,
  ServicePointField,
} from '../dto/canonical.dto';
import { ServicePointLinkage } from '../interfaces/source-adapter.interface';
import {
  absent,
  column,
  constant,
  FieldMapping,
  optionalColumn,
} from '../mapping/field-mapping';
import { MappedSourceAdapter } from './mapped-source.adapter';

/**
 * Utility 1 Export Adapter
 *
 * File Structure:
 * - utility1_service_points.csv: SERVICE_POINT_ID, SERVICE_POINT_NUMBER,
 *   SERVICE_POINT_STREET, SERVICE_POINT_CITY, SERVICE_POINT_ZIP,
 *   SERVICE_POINT_STATE, INSTALLED_AT, REMOVED_AT, CREATED, UPDATED
 * - utility1_meters.csv: meter_id, meter_type, meter_category
 *   (plus reading columns that are not meter metadata)
 * - utility1_intervals.csv: service_delivery_point_id, meter_id, channel,
 *   duration, value, quality, timestamp, last_update_time, exported_at
 *
 * Notes:
 * - Addresses arrive as a single street line; no house number/unit split
 * - Meters carry no premise link; intervals reference the service point
 *   directly
 * - Timestamps are ISO-like text
 */
@Injectable()
export class Utility1Adapter extends MappedSourceAdapter {
  readonly name = 'utility1';
  readonly sourceTag = 'UTILITY1';
  readonly description = 'Utility 1 CIS/MDM CSV export (SERVICE_POINT_* layout)';
  readonly idPrefixes = ['SP-', 'MTR-'];
  readonly servicePointLinkage: ServicePointLinkage = 'direct';

  protected readonly timestampFormat: TimestampFormat = 'iso';

  protected readonly servicePointMapping: FieldMapping<ServicePointField> = {
    sourceTag: constant(this.sourceTag),
    servicePointId: column('SERVICE_POINT_ID'),
    servicePointNumber: column('SERVICE_POINT_NUMBER'),
    houseNum: absent(),
    street: column('SERVICE_POINT_STREET'),
    houseSupp: absent(),
    city: column('SERVICE_POINT_CITY'),
    zip: column('SERVICE_POINT_ZIP'),
    state: column('SERVICE_POINT_STATE'),
    installedAt: optionalColumn('INSTALLED_AT'),
    removedAt: optionalColumn('REMOVED_AT'),
    createdAt: optionalColumn('CREATED'),
    updatedAt: optionalColumn('UPDATED'),
  };

  protected readonly meterMapping: FieldMapping<MeterField> = {
    sourceTag: constant(this.sourceTag),
    meterId: column('meter_id'),
    // The meter id doubles as the serial number in this export
    serialNumber: column('meter_id'),
    meterType: optionalColumn('meter_type'),
    meterCategory: optionalColumn('meter_category'),
    servicePointId: absent(),
    installedAt: absent(),
    removedAt: absent(),
    createdAt: absent(),
    updatedAt: absent(),
  };

  protected readonly intervalMapping: FieldMapping<IntervalField> = {
    sourceTag: constant(this.sourceTag),
    servicePointId: column('service_delivery_point_id'),
    meterId: column('meter_id'),
    intervalStartTs: column('timestamp'),
    durationSeconds: column('duration'),
    value: column('value'),
    quality: column('quality'),
    channel: column('channel'),
    lastUpdateTime: optionalColumn('last_update_time'),
    exportedAt: optionalColumn('exported_at'),
  };
}
