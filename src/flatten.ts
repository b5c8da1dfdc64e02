// Record Flattener - Turns heterogeneous records into one table
import type { InventoryRecord, JsonValue } from './types.js';

/**
 * Value of a single table cell. `null` is an empty cell.
 */
export type CellValue = string | number | boolean | null;

/**
 * Tabular form of a record list: one row per record, aligned with `columns`.
 */
export interface FlatTable {
  columns: string[];
  rows: CellValue[][];
}

/**
 * Convert a record field into a cell value.
 * Nested mappings and sequences are kept whole as JSON text instead of
 * being spread over extra columns.
 */
export function toCellValue(value: JsonValue | undefined): CellValue {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return value;
}

/**
 * Collect the union of top-level field names, in order of first appearance.
 */
export function collectColumns(records: InventoryRecord[]): string[] {
  const columns = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      columns.add(key);
    }
  }
  return Array.from(columns);
}

/**
 * Flatten records whose field sets differ into a single table.
 * Fields a record lacks become empty cells.
 */
export function flattenRecords(records: InventoryRecord[]): FlatTable {
  const columns = collectColumns(records);
  const rows = records.map(record =>
    columns.map(column => toCellValue(Object.hasOwn(record, column) ? record[column] : undefined))
  );
  return { columns, rows };
}
