import { dropDuplicates } from '../common/table';
import {
  IntervalRecord,
  MeterRecord,
  ServicePointRecord,
  StagedInterval,
  StagedMeter,
  StagedServicePoint,
  UNKNOWN_SOURCE,
} from './dto/canonical.dto';

/**
 * Id prefixes that identify one source tag
 */
export interface SourceTagRule {
  sourceTag: string;
  /** Empty = catch-all for ids no other rule claims */
  idPrefixes: readonly string[];
}

export interface ReconcileResult<T> {
  rows: T[];
  /** Rows discarded because another row had the same key */
  duplicatesDropped: number;
  /** Rows discarded because their identifier was null */
  missingIdDropped: number;
  /** Rows whose source tag came from the prefix heuristic */
  tagsInferred: number;
}

/**
 * FALLBACK HEURISTIC: attribute an untagged record to a source system by
 * the prefix of its own identifier.
 *
 * Only ever called for records whose source tag is null. It is a
 * best-effort guess, not a guarantee: ids of different utilities can
 * share a prefix.
 *
 * @param candidateIds - identifiers in priority order; the first non-null one is used
 */
export function inferSourceTag(
  candidateIds: ReadonlyArray<string | null>,
  rules: readonly SourceTagRule[],
): string {
  const id = candidateIds.find((candidate) => candidate !== null) ?? '';

  const prefixed = rules.find((rule) =>
    rule.idPrefixes.some((prefix) => id.startsWith(prefix)),
  );
  if (prefixed) return prefixed.sourceTag;

  const catchAll = rules.find((rule) => rule.idPrefixes.length === 0);
  return catchAll?.sourceTag ?? UNKNOWN_SOURCE;
}

/**
 * Fill missing tags, drop rows without an id, keep the first row per
 * (sourceTag, servicePointId).
 */
export function reconcileServicePoints(
  staged: readonly StagedServicePoint[],
  rules: readonly SourceTagRule[],
): ReconcileResult<ServicePointRecord> {
  let missingIdDropped = 0;
  let tagsInferred = 0;
  const tagged: ServicePointRecord[] = [];

  for (const row of staged) {
    const servicePointId = row.servicePointId;
    if (servicePointId === null) {
      missingIdDropped++;
      continue;
    }
    if (row.sourceTag === null) tagsInferred++;
    tagged.push({
      ...row,
      servicePointId,
      sourceTag: row.sourceTag ?? inferSourceTag([servicePointId], rules),
    });
  }

  const rows = dropDuplicates(tagged, (sp) => [sp.sourceTag, sp.servicePointId]);
  return {
    rows,
    duplicatesDropped: tagged.length - rows.length,
    missingIdDropped,
    tagsInferred,
  };
}

/**
 * Fill missing tags, drop rows without an id, keep the first row per
 * (sourceTag, meterId).
 */
export function reconcileMeters(
  staged: readonly StagedMeter[],
  rules: readonly SourceTagRule[],
): ReconcileResult<MeterRecord> {
  let missingIdDropped = 0;
  let tagsInferred = 0;
  const tagged: MeterRecord[] = [];

  for (const row of staged) {
    const meterId = row.meterId;
    if (meterId === null) {
      missingIdDropped++;
      continue;
    }
    if (row.sourceTag === null) tagsInferred++;
    tagged.push({
      ...row,
      meterId,
      sourceTag:
        row.sourceTag ?? inferSourceTag([row.servicePointId, meterId], rules),
    });
  }

  const rows = dropDuplicates(tagged, (m) => [m.sourceTag, m.meterId]);
  return {
    rows,
    duplicatesDropped: tagged.length - rows.length,
    missingIdDropped,
    tagsInferred,
  };
}

/**
 * Fill missing tags and keep the first reading per
 * (sourceTag, servicePointId, meterId, intervalStartTs, channel).
 *
 * Readings are never dropped for null ids; a null start timestamp still
 * takes part in the key.
 */
export function reconcileIntervals(
  staged: readonly StagedInterval[],
  rules: readonly SourceTagRule[],
): ReconcileResult<IntervalRecord> {
  let tagsInferred = 0;
  const tagged: IntervalRecord[] = staged.map((row) => {
    if (row.sourceTag !== null) {
      return { ...row, sourceTag: row.sourceTag };
    }
    tagsInferred++;
    return {
      ...row,
      sourceTag: inferSourceTag([row.servicePointId, row.meterId], rules),
    };
  });

  const rows = dropDuplicates(tagged, (i) => [
    i.sourceTag,
    i.servicePointId,
    i.meterId,
    i.intervalStartTs,
    i.channel,
  ]);
  return {
    rows,
    duplicatesDropped: tagged.length - rows.length,
    missingIdDropped: 0,
    tagsInferred,
  };
}
