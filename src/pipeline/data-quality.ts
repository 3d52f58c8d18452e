import { compositeKey, Table } from '../common/table';
import {
  IntervalRecord,
  MeterRecord,
  ServicePointRecord,
} from '../standardization/dto/canonical.dto';
import { UsageSummaryRecord } from '../usage/window-aggregator';

export interface SourceCounts {
  sourceTag: string;
  servicePoints: number;
  meters: number;
  intervals: number;
  summaryRows: number;
}

export interface TimeRange {
  earliest: Date | null;
  latest: Date | null;
}

export interface NumericStats {
  count: number;
  mean: number;
  min: number;
  max: number;
}

/**
 * Data-quality snapshot of one pipeline run, for reporting/QA consumers.
 * Orphans are findings here, never errors upstream.
 */
export interface DataQualityReport {
  rowCounts: {
    servicePoints: number;
    meters: number;
    intervals: number;
    summary: number;
  };
  bySource: SourceCounts[];
  referentialIntegrity: {
    /** Interval service points with no service point row, per source */
    orphanServicePointIds: Array<{ sourceTag: string; servicePointId: string }>;
    /** Readings whose service point is null or unknown */
    orphanIntervalRows: number;
    /** Readings whose (sourceTag, meterId) has no meter row */
    intervalsWithUnknownMeter: number;
  };
  nullKeys: {
    intervalsWithoutServicePoint: number;
    metersWithoutServicePoint: number;
  };
  intervalTimeRange: TimeRange;
  summary: {
    bucketRange: TimeRange;
    intervalCount: NumericStats | null;
  };
}

export function buildDataQualityReport(
  servicePoints: Table<ServicePointRecord>,
  meters: Table<MeterRecord>,
  intervals: Table<IntervalRecord>,
  summary: Table<UsageSummaryRecord>,
): DataQualityReport {
  const servicePointKeys = new Set(
    servicePoints.rows.map((sp) => compositeKey([sp.sourceTag, sp.servicePointId])),
  );
  const meterKeys = new Set(
    meters.rows.map((m) => compositeKey([m.sourceTag, m.meterId])),
  );

  const orphanServicePoints = new Map<
    string,
    { sourceTag: string; servicePointId: string }
  >();
  let orphanIntervalRows = 0;
  let intervalsWithUnknownMeter = 0;
  let intervalsWithoutServicePoint = 0;

  for (const interval of intervals.rows) {
    const { sourceTag, servicePointId, meterId } = interval;
    if (servicePointId === null) {
      intervalsWithoutServicePoint++;
      orphanIntervalRows++;
    } else {
      const key = compositeKey([sourceTag, servicePointId]);
      if (!servicePointKeys.has(key)) {
        orphanIntervalRows++;
        if (!orphanServicePoints.has(key)) {
          orphanServicePoints.set(key, { sourceTag, servicePointId });
        }
      }
    }

    if (meterId === null || !meterKeys.has(compositeKey([sourceTag, meterId]))) {
      intervalsWithUnknownMeter++;
    }
  }

  return {
    rowCounts: {
      servicePoints: servicePoints.rows.length,
      meters: meters.rows.length,
      intervals: intervals.rows.length,
      summary: summary.rows.length,
    },
    bySource: countBySource(servicePoints, meters, intervals, summary),
    referentialIntegrity: {
      orphanServicePointIds: [...orphanServicePoints.values()],
      orphanIntervalRows,
      intervalsWithUnknownMeter,
    },
    nullKeys: {
      intervalsWithoutServicePoint,
      metersWithoutServicePoint: meters.rows.filter(
        (m) => m.servicePointId === null,
      ).length,
    },
    intervalTimeRange: timeRange(
      intervals.rows.map((i) => i.intervalStartTs),
      intervals.rows.map((i) => i.intervalStartTs),
    ),
    summary: {
      bucketRange: timeRange(
        summary.rows.map((s) => s.bucketStart),
        summary.rows.map((s) => s.bucketEnd),
      ),
      intervalCount: summarizeCounts(summary.rows.map((s) => s.intervalCount)),
    },
  };
}

function countBySource(
  servicePoints: Table<ServicePointRecord>,
  meters: Table<MeterRecord>,
  intervals: Table<IntervalRecord>,
  summary: Table<UsageSummaryRecord>,
): SourceCounts[] {
  const counts = new Map<string, SourceCounts>();
  const entry = (sourceTag: string): SourceCounts => {
    let found = counts.get(sourceTag);
    if (!found) {
      found = { sourceTag, servicePoints: 0, meters: 0, intervals: 0, summaryRows: 0 };
      counts.set(sourceTag, found);
    }
    return found;
  };

  for (const sp of servicePoints.rows) entry(sp.sourceTag).servicePoints++;
  for (const m of meters.rows) entry(m.sourceTag).meters++;
  for (const i of intervals.rows) entry(i.sourceTag).intervals++;
  for (const s of summary.rows) entry(s.sourceTag).summaryRows++;

  return [...counts.values()].sort((a, b) =>
    a.sourceTag < b.sourceTag ? -1 : a.sourceTag > b.sourceTag ? 1 : 0,
  );
}

/**
 * Earliest of `starts` and latest of `ends`, ignoring nulls
 */
function timeRange(
  starts: ReadonlyArray<Date | null>,
  ends: ReadonlyArray<Date | null>,
): TimeRange {
  let earliest: Date | null = null;
  let latest: Date | null = null;
  for (const ts of starts) {
    if (ts && (!earliest || ts < earliest)) earliest = ts;
  }
  for (const ts of ends) {
    if (ts && (!latest || ts > latest)) latest = ts;
  }
  return { earliest, latest };
}

function summarizeCounts(values: readonly number[]): NumericStats | null {
  if (values.length === 0) return null;
  let total = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    total += value;
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { count: values.length, mean: total / values.length, min, max };
}
