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
 * Utility 2 Export Adapter (premise-centric layout)
 *
 * File Structure:
 * - utility2_service_points.csv: premise_id, created_date,
 *   premise_house_num, premise_street, premise_house_supp, premise_city,
 *   premise_zip, premise_region
 * - utility2_meters.csv: premise_id, meter_id, meter_number, meter_type,
 *   meter_status, meter_channel, installed_at, removed_at, created, updated
 * - utility2_intervals.csv: channel, duration, meter_id, quality,
 *   timestamp, value
 *
 * Notes:
 * - Intervals do not name their premise; it is inherited from the meter
 * - Timestamps may be compact numeric dates (20251001T080000)
 * - Premise ids follow no fixed pattern, so this adapter is the
 *   catch-all when an untagged record has to be attributed
 */
@Injectable()
export class Utility2Adapter extends MappedSourceAdapter {
  readonly name = 'utility2';
  readonly sourceTag = 'UTILITY2';
  readonly description = 'Utility 2 premise/meter CSV export';
  readonly idPrefixes: readonly string[] = [];
  readonly servicePointLinkage: ServicePointLinkage = 'via-meter';

  protected readonly timestampFormat: TimestampFormat = 'compact';

  protected readonly servicePointMapping: FieldMapping<ServicePointField> = {
    sourceTag: constant(this.sourceTag),
    servicePointId: column('premise_id'),
    servicePointNumber: absent(),
    houseNum: column('premise_house_num'),
    street: column('premise_street'),
    houseSupp: optionalColumn('premise_house_supp'),
    city: column('premise_city'),
    zip: column('premise_zip'),
    state: column('premise_region'),
    installedAt: absent(),
    removedAt: absent(),
    createdAt: optionalColumn('created_date'),
    updatedAt: absent(),
  };

  protected readonly meterMapping: FieldMapping<MeterField> = {
    sourceTag: constant(this.sourceTag),
    meterId: column('meter_id'),
    serialNumber: column('meter_number'),
    meterType: column('meter_type'),
    meterCategory: optionalColumn('meter_channel'),
    servicePointId: column('premise_id'),
    installedAt: optionalColumn('installed_at'),
    removedAt: optionalColumn('removed_at'),
    createdAt: optionalColumn('created'),
    updatedAt: optionalColumn('updated'),
  };

  protected readonly intervalMapping: FieldMapping<IntervalField> = {
    sourceTag: constant(this.sourceTag),
    servicePointId: absent(),
    meterId: column('meter_id'),
    intervalStartTs: column('timestamp'),
    durationSeconds: column('duration'),
    value: column('value'),
    quality: column('quality'),
    channel: column('channel'),
    lastUpdateTime: absent(),
    exportedAt: absent(),
  };
}
