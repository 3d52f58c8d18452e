import {
  StagedInterval,
  StagedMeter,
  StagedServicePoint,
} from '../dto/canonical.dto';
import { RawTable } from './raw-table.interface';

/**
 * How interval readings of a source system reach their service point
 *
 * - direct: the interval export carries the service point id
 * - via-meter: only meters know their premise; readings inherit it
 */
export type ServicePointLinkage = 'direct' | 'via-meter';

/**
 * ISourceAdapter Interface - one adapter per upstream utility
 *
 * Each utility exports service points, meters and interval readings in
 * its own shape. An adapter maps those raw tables into the canonical
 * model; the standardization service combines and reconciles the
 * results. Supporting a new utility means registering a new adapter,
 * not branching inside the pipeline.
 *
 * Usage:
 * ```typescript
 * for (const adapter of adapters) {
 *   const tables = raw[adapter.name];
 *   servicePoints.push(...adapter.mapServicePoints(tables.servicePoints));
 * }
 * ```
 */
export interface ISourceAdapter {
  /**
   * Adapter identifier, also the raw data directory name.
   * Examples: 'utility1', 'utility2'
   */
  readonly name: string;

  /**
   * Source tag stamped on every canonical record of this utility.
   * Examples: 'UTILITY1', 'UTILITY2'
   */
  readonly sourceTag: string;

  /** Human-readable description of the export */
  readonly description: string;

  /**
   * Identifier prefixes used to infer this source tag when a record
   * arrives untagged. An empty list makes this adapter the catch-all.
   */
  readonly idPrefixes: readonly string[];

  readonly servicePointLinkage: ServicePointLinkage;

  /**
   * Map the raw service point export.
   * @throws SourceDataError if a required column is missing
   */
  mapServicePoints(raw: RawTable): StagedServicePoint[];

  /**
   * Map the raw meter export.
   * @throws SourceDataError if a required column is missing
   */
  mapMeters(raw: RawTable): StagedMeter[];

  /**
   * Map the raw interval export. Readings of a via-meter source come back
   * without a service point id; the standardization service links them.
   * @throws SourceDataError if a required column is missing
   */
  mapIntervals(raw: RawTable): StagedInterval[];
}

/**
 * Fatal input problem for one source system: a missing raw table or a
 * missing required column.
 */
export class SourceDataError extends Error {
  constructor(
    public readonly sourceName: string,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`[${sourceName}] ${message}`);
    this.name = 'SourceDataError';
  }
}
