/**
 * Tabular primitives shared by every pipeline stage.
 *
 * Each stage returns a `Table`: the row objects plus an explicit column
 * list, so an empty result still carries its schema for reporting
 * consumers.
 */

/** A single cell after coercion */
export type CellValue = string | number | Date | null;

/** A loosely-typed row, used where the column set is only known at run time */
export type Row = Record<string, CellValue>;

export interface Table<R> {
  readonly columns: readonly (keyof R & string)[];
  readonly rows: readonly R[];
}

/**
 * Build a table with a known column list
 */
export function createTable<R>(
  columns: readonly (keyof R & string)[],
  rows: readonly R[] = [],
): Table<R> {
  return { columns: [...columns], rows };
}

/**
 * Project typed records into loosely-typed rows keyed by the table's columns
 */
export function toRowTable<R extends { [K in keyof R]: CellValue }>(
  table: Table<R>,
): Table<Row> {
  const rows = table.rows.map((record) => {
    const row: Row = {};
    for (const column of table.columns) {
      row[column] = record[column];
    }
    return row;
  });
  return createTable<Row>(table.columns, rows);
}

/**
 * Serialize key parts so that Dates compare by instant and nulls only
 * match nulls.
 */
export function compositeKey(parts: readonly CellValue[]): string {
  return parts
    .map((part) => {
      if (part === null) return '\u0000';
      if (part instanceof Date) return `d:${part.getTime()}`;
      return `${typeof part}:${String(part)}`;
    })
    .join('\u001f');
}

/**
 * Keep the first row seen for every key
 */
export function dropDuplicates<R>(
  rows: readonly R[],
  keyOf: (row: R) => readonly CellValue[],
): R[] {
  const seen = new Set<string>();
  const kept: R[] = [];
  for (const row of rows) {
    const key = compositeKey(keyOf(row));
    if (seen.has(key)) continue;
    seen.add(key);
    kept.push(row);
  }
  return kept;
}

/**
 * Left outer join on equal key columns.
 *
 * Right-side key columns are not repeated. A right column whose name is
 * already taken on the left gets `suffix` appended. Rows whose key
 * contains a null never match. The right side is expected to be unique
 * per key (reconciled entities are); the first match wins otherwise.
 */
export function leftJoin(
  left: Table<Row>,
  right: Table<Row>,
  on: readonly string[],
  suffix: string,
): Table<Row> {
  const keyColumns = new Set(on);
  const taken = new Set<string>(left.columns);
  const rightColumns: Array<{ source: string; target: string }> = [];

  for (const column of right.columns) {
    if (keyColumns.has(column)) continue;
    const target = taken.has(column) ? `${column}${suffix}` : column;
    taken.add(target);
    rightColumns.push({ source: column, target });
  }

  const index = new Map<string, Row>();
  for (const row of right.rows) {
    const parts = on.map((column) => row[column] ?? null);
    if (parts.includes(null)) continue;
    const key = compositeKey(parts);
    if (!index.has(key)) {
      index.set(key, row);
    }
  }

  const rows = left.rows.map((row) => {
    const joined: Row = { ...row };
    const parts = on.map((column) => row[column] ?? null);
    const match = parts.includes(null)
      ? undefined
      : index.get(compositeKey(parts));
    for (const { source, target } of rightColumns) {
      joined[target] = match ? (match[source] ?? null) : null;
    }
    return joined;
  });

  return createTable<Row>(
    [...left.columns, ...rightColumns.map((c) => c.target)],
    rows,
  );
}
