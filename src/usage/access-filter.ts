import { CellValue, createTable, Row, Table } from '../common/table';

/**
 * internal: raw location fields; external: redacted location fields
 */
export type AccessLevel = 'internal' | 'external';

export const DEFAULT_ACCESS_LEVEL: AccessLevel = 'external';

/** Replacement for fully redacted values */
export const MASKED_VALUE = '***MASKED***';

/** Suffix appended to truncated quasi-identifiers */
export const PARTIAL_MASK_SUFFIX = '**';

const PARTIAL_MASK_PREFIX_LENGTH = 3;
const PARTIALLY_MASKED = /^.{0,3}\*\*$/s;

export type MaskingStrategy = 'redact' | 'truncate';

export interface PiiMaskingRule {
  column: string;
  strategy: MaskingStrategy;
}

/**
 * Location columns that external consumers must not see in full.
 * Columns missing from a table are skipped.
 */
export const PII_MASKING_RULES: readonly PiiMaskingRule[] = [
  { column: 'street', strategy: 'redact' },
  { column: 'houseNum', strategy: 'redact' },
  { column: 'houseSupp', strategy: 'redact' },
  { column: 'zip', strategy: 'truncate' },
];

/**
 * Anything other than an explicit "internal" string is treated as external
 */
export function resolveAccessLevel(level?: unknown): AccessLevel {
  return typeof level === 'string' && level.trim().toLowerCase() === 'internal'
    ? 'internal'
    : DEFAULT_ACCESS_LEVEL;
}

export function getPiiColumns(): string[] {
  return PII_MASKING_RULES.map((rule) => rule.column);
}

/**
 * Apply column-level masking for the given access level.
 *
 * Internal access returns the input table itself. External access returns
 * a masked copy; the input rows are never modified. Masking an already
 * masked table yields the same values.
 */
export function maskPii(table: Table<Row>, level?: unknown): Table<Row> {
  if (resolveAccessLevel(level) === 'internal') {
    return table;
  }

  const present = new Set<string>(table.columns);
  const rules = PII_MASKING_RULES.filter((rule) => present.has(rule.column));
  if (rules.length === 0) {
    return createTable<Row>(table.columns, [...table.rows]);
  }

  const rows = table.rows.map((row) => {
    const masked: Row = { ...row };
    for (const { column, strategy } of rules) {
      masked[column] = applyStrategy(strategy, row[column] ?? null);
    }
    return masked;
  });
  return createTable<Row>(table.columns, rows);
}

function applyStrategy(strategy: MaskingStrategy, value: CellValue): CellValue {
  if (value === null) return null;

  switch (strategy) {
    case 'redact':
      return MASKED_VALUE;
    case 'truncate': {
      const text = value instanceof Date ? value.toISOString() : String(value);
      if (PARTIALLY_MASKED.test(text)) return text;
      return text.slice(0, PARTIAL_MASK_PREFIX_LENGTH) + PARTIAL_MASK_SUFFIX;
    }
  }
}
