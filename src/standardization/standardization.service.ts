import { Injectable, Logger } from '@nestjs/common';
import { compositeKey, createTable, Table } from '../common/table';
import {
  INTERVAL_COLUMNS,
  IntervalRecord,
  METER_COLUMNS,
  MeterRecord,
  SERVICE_POINT_COLUMNS,
  ServicePointRecord,
  StagedInterval,
  StagedMeter,
  StagedServicePoint,
} from './dto/canonical.dto';
import {
  RAW_TABLE_NAMES,
  RawDataset,
  RawEntity,
  RawTable,
} from './interfaces/raw-table.interface';
import {
  ISourceAdapter,
  SourceDataError,
} from './interfaces/source-adapter.interface';
import {
  reconcileIntervals,
  reconcileMeters,
  reconcileServicePoints,
  ReconcileResult,
  SourceTagRule,
} from './identity-reconciler';
import { Utility1Adapter } from './adapters/utility1.adapter';
import { Utility2Adapter } from './adapters/utility2.adapter';

/**
 * The three canonical tables of the standardized layer
 */
export interface StandardizedTables {
  servicePoints: Table<ServicePointRecord>;
  meters: Table<MeterRecord>;
  intervals: Table<IntervalRecord>;
}

/**
 * StandardizationService - maps every utility's raw export into the
 * canonical model
 *
 * Responsibilities:
 * 1. Adapter Registry: one adapter per utility, applied in registration order
 * 2. Combination: per-utility tables concatenated into one table per entity
 * 3. Reconciliation: untagged records attributed, duplicates collapsed
 * 4. Linkage: readings of via-meter utilities inherit the meter's premise
 */
@Injectable()
export class StandardizationService {
  private readonly logger = new Logger(StandardizationService.name);
  private readonly adapters: ISourceAdapter[];
  private readonly tagRules: SourceTagRule[];

  constructor(
    private readonly utility1Adapter: Utility1Adapter,
    private readonly utility2Adapter: Utility2Adapter,
  ) {
    // Registration order is also the first-seen order for deduplication
    this.adapters = [
      this.utility1Adapter,
      this.utility2Adapter,
      // Add more utilities here
    ];

    this.tagRules = this.adapters.map((adapter) => ({
      sourceTag: adapter.sourceTag,
      idPrefixes: adapter.idPrefixes,
    }));

    this.logger.log(
      `Initialized with ${this.adapters.length} source adapter(s): ${this.adapters.map((a) => a.name).join(', ')}`,
    );
  }

  /**
   * Standardize all three entities in one pass
   */
  standardize(raw: RawDataset): StandardizedTables {
    this.warnUnregisteredSources(raw);

    const servicePoints = this.standardizeServicePoints(raw);
    const meters = this.standardizeMeters(raw);
    const intervals = this.standardizeIntervals(raw, meters);

    return { servicePoints, meters, intervals };
  }

  /**
   * Combined service point table across utilities
   */
  standardizeServicePoints(raw: RawDataset): Table<ServicePointRecord> {
    const staged: StagedServicePoint[] = [];
    for (const adapter of this.adapters) {
      staged.push(
        ...adapter.mapServicePoints(
          this.requireTable(raw, adapter, 'servicePoints'),
        ),
      );
    }

    const result = reconcileServicePoints(staged, this.tagRules);
    this.logReconciliation('service points', staged.length, result);
    return createTable<ServicePointRecord>(SERVICE_POINT_COLUMNS, result.rows);
  }

  /**
   * Combined meter table across utilities
   */
  standardizeMeters(raw: RawDataset): Table<MeterRecord> {
    const staged: StagedMeter[] = [];
    for (const adapter of this.adapters) {
      staged.push(
        ...adapter.mapMeters(this.requireTable(raw, adapter, 'meters')),
      );
    }

    const result = reconcileMeters(staged, this.tagRules);
    this.logReconciliation('meters', staged.length, result);
    return createTable<MeterRecord>(METER_COLUMNS, result.rows);
  }

  /**
   * Combined interval table across utilities
   *
   * @param meters - standardized meters used for via-meter linkage;
   *   built from `raw` when omitted
   */
  standardizeIntervals(
    raw: RawDataset,
    meters: Table<MeterRecord> = this.standardizeMeters(raw),
  ): Table<IntervalRecord> {
    const meterIndex = new Map<string, MeterRecord>();
    for (const meter of meters.rows) {
      meterIndex.set(compositeKey([meter.sourceTag, meter.meterId]), meter);
    }

    const staged: StagedInterval[] = [];
    for (const adapter of this.adapters) {
      const intervals = adapter.mapIntervals(
        this.requireTable(raw, adapter, 'intervals'),
      );
      staged.push(
        ...(adapter.servicePointLinkage === 'via-meter'
          ? this.linkViaMeter(adapter, intervals, meterIndex)
          : intervals),
      );
    }

    const result = reconcileIntervals(staged, this.tagRules);
    this.logReconciliation('intervals', staged.length, result);
    return createTable<IntervalRecord>(INTERVAL_COLUMNS, result.rows);
  }

  /**
   * Get list of registered source adapters
   */
  getSupportedSources(): {
    name: string;
    sourceTag: string;
    description: string;
  }[] {
    return this.adapters.map((a) => ({
      name: a.name,
      sourceTag: a.sourceTag,
      description: a.description,
    }));
  }

  /**
   * Left join readings -> meters on (sourceTag, meterId). Readings with no
   * matching meter keep a null service point id.
   */
  private linkViaMeter(
    adapter: ISourceAdapter,
    intervals: StagedInterval[],
    meterIndex: Map<string, MeterRecord>,
  ): StagedInterval[] {
    let unlinked = 0;
    const linked = intervals.map((interval) => {
      if (interval.servicePointId !== null) return interval;

      const meter =
        interval.sourceTag !== null && interval.meterId !== null
          ? meterIndex.get(compositeKey([interval.sourceTag, interval.meterId]))
          : undefined;
      const servicePointId = meter?.servicePointId ?? null;
      if (servicePointId === null) unlinked++;
      return { ...interval, servicePointId };
    });

    if (unlinked > 0) {
      this.logger.warn(
        `${adapter.name}: ${unlinked}/${intervals.length} readings could not be linked to a service point via their meter`,
      );
    }
    return linked;
  }

  private requireTable(
    raw: RawDataset,
    adapter: ISourceAdapter,
    entity: RawEntity,
  ): RawTable {
    const table = raw[adapter.name]?.[entity];
    if (!table) {
      throw new SourceDataError(
        adapter.name,
        `Missing raw table "${RAW_TABLE_NAMES[entity]}"`,
      );
    }
    return table;
  }

  private warnUnregisteredSources(raw: RawDataset): void {
    const known = new Set(this.adapters.map((a) => a.name));
    for (const source of Object.keys(raw)) {
      if (!known.has(source)) {
        this.logger.warn(`Ignoring raw data for unregistered source: ${source}`);
      }
    }
  }

  private logReconciliation<T>(
    entity: string,
    stagedCount: number,
    result: ReconcileResult<T>,
  ): void {
    this.logger.log(
      `Standardized ${entity}: ${result.rows.length}/${stagedCount} rows kept`,
    );
    if (result.duplicatesDropped > 0) {
      this.logger.debug(
        `${entity}: ${result.duplicatesDropped} duplicate row(s) collapsed (first occurrence kept)`,
      );
    }
    if (result.missingIdDropped > 0) {
      this.logger.warn(
        `${entity}: ${result.missingIdDropped} row(s) dropped for a missing identifier`,
      );
    }
    if (result.tagsInferred > 0) {
      this.logger.warn(
        `${entity}: source tag inferred from id prefix for ${result.tagsInferred} row(s)`,
      );
    }
  }
}
