import { RawTable } from '../interfaces/raw-table.interface';
import { SourceDataError } from '../interfaces/source-adapter.interface';

/** A raw cell once blanks have been turned into null */
export type MappedValue = string | number | null;

/**
 * Where a canonical field comes from
 */
export type FieldRule =
  | { kind: 'column'; column: string; required: boolean }
  | { kind: 'constant'; value: string }
  | { kind: 'null' };

/**
 * Every canonical field must be mapped, constant-filled or explicitly null.
 * Source columns not named here are dropped.
 */
export type FieldMapping<K extends string> = Record<K, FieldRule>;

/** Lookup of a canonical field's raw value within one row */
export type MappedRow<K extends string> = (field: K) => MappedValue;

/** Source column that must exist in the export */
export function column(name: string): FieldRule {
  return { kind: 'column', column: normalizeColumnName(name), required: true };
}

/** Source column that yields null when the export lacks it */
export function optionalColumn(name: string): FieldRule {
  return { kind: 'column', column: normalizeColumnName(name), required: false };
}

export function constant(value: string): FieldRule {
  return { kind: 'constant', value };
}

/** Field the source system does not model */
export function absent(): FieldRule {
  return { kind: 'null' };
}

/**
 * Column names are matched case- and whitespace-insensitively
 */
export function normalizeColumnName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Apply a field mapping to a raw table.
 *
 * @param context - source and table names, used in diagnostics
 * @throws SourceDataError when a required column is missing
 */
export function applyMapping<K extends string>(
  raw: RawTable,
  mapping: FieldMapping<K>,
  context: { source: string; table: string },
): MappedRow<K>[] {
  // Normalized name -> original name; first occurrence wins on clashes
  const columnIndex = new Map<string, string>();
  for (const name of raw.columns) {
    const normalized = normalizeColumnName(name);
    if (!columnIndex.has(normalized)) {
      columnIndex.set(normalized, name);
    }
  }

  for (const rule of Object.values<FieldRule>(mapping)) {
    if (
      rule.kind === 'column' &&
      rule.required &&
      !columnIndex.has(rule.column)
    ) {
      throw new SourceDataError(
        context.source,
        `Table "${context.table}" is missing required column "${rule.column}"`,
      );
    }
  }

  return raw.rows.map((row) => (field: K): MappedValue => {
    const rule = mapping[field];
    switch (rule.kind) {
      case 'constant':
        return rule.value;
      case 'null':
        return null;
      case 'column': {
        const original = columnIndex.get(rule.column);
        return original === undefined ? null : blankToNull(row[original]);
      }
    }
  });
}

function blankToNull(value: string | number | null | undefined): MappedValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' && value.trim() === '') return null;
  return value;
}
