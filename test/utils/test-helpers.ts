import {
  RawCell,
  RawDataset,
  RawTable,
} from '../../src/standardization/interfaces/raw-table.interface';

/**
 * Build a raw table from a header and row objects
 */
export function rawTable(
  columns: string[],
  rows: Array<Record<string, RawCell>> = [],
): RawTable {
  return { columns, rows };
}

/**
 * Build a raw table from CSV-like lines; the first line is the header
 */
export function rawTableFromLines(lines: string[][]): RawTable {
  const [header = [], ...body] = lines;
  return {
    columns: header,
    rows: body.map((cells) =>
      Object.fromEntries(header.map((name, i) => [name, cells[i] ?? ''])),
    ),
  };
}

/**
 * Empty raw tables with the full header of every source, for empty-input tests
 */
export function emptyDataset(dataset: RawDataset): RawDataset {
  return Object.fromEntries(
    Object.entries(dataset).map(([source, tables]) => [
      source,
      Object.fromEntries(
        Object.entries(tables).map(([entity, table]) => [
          entity,
          { columns: table?.columns ?? [], rows: [] },
        ]),
      ),
    ]),
  );
}
