/**
 * Statistics collector
 *
 * Describes a table snapshot: shape, empty rows and columns, duplicate
 * rows, empty cells and per-column cardinality. Column types are read off
 * the cells as they are now; nothing is re-detected.
 */

import { ColumnKind, Table, cellKey, columnKind, getRow, isMissing, rowKey } from "./table.js";

export interface ColumnStats {
  uniqueValues: number;
  nullCount: number;
  dataType: ColumnKind;
}

export interface TableStats {
  totalRows: number;
  totalColumns: number;
  emptyRows: number;
  emptyColumns: number;
  duplicateRows: number;
  totalEmptyCells: number;
  /** Column names in table order */
  columnNames: string[];
  columns: Record<string, ColumnStats>;
}

/**
 * Computes the statistics of a table. The result is frozen.
 *
 * Duplicate rows follow the same full-row equality used when duplicates are
 * removed: every row equal to an earlier one counts once.
 */
export function computeStats(table: Table): Readonly<TableStats> {
  let emptyRows = 0;
  let duplicateRows = 0;
  const seenRows = new Set<string>();

  for (let r = 0; r < table.rowCount; r++) {
    const row = getRow(table, r);
    if (row.every(isMissing)) emptyRows++;

    const key = rowKey(row);
    if (seenRows.has(key)) {
      duplicateRows++;
    } else {
      seenRows.add(key);
    }
  }

  let emptyColumns = 0;
  let totalEmptyCells = 0;
  const entries: Array<[string, ColumnStats]> = [];

  for (const column of table.columns) {
    const distinct = new Set<string>();
    let nullCount = 0;

    for (const cell of column.cells) {
      if (isMissing(cell)) {
        nullCount++;
      } else {
        distinct.add(cellKey(cell));
      }
    }

    if (nullCount === column.cells.length) emptyColumns++;
    totalEmptyCells += nullCount;

    entries.push([
      column.name,
      Object.freeze({
        uniqueValues: distinct.size,
        nullCount,
        dataType: columnKind(column.cells)
      })
    ]);
  }

  return Object.freeze({
    totalRows: table.rowCount,
    totalColumns: table.columns.length,
    emptyRows,
    emptyColumns,
    duplicateRows,
    totalEmptyCells,
    columnNames: table.columns.map(column => column.name),
    // fromEntries defines own properties, so "__proto__" stays a column
    columns: Object.freeze(Object.fromEntries(entries))
  });
}
