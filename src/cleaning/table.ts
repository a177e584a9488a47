/**
 * Table data model
 *
 * In-memory rectangular dataset with labeled columns. Every cell carries
 * its own kind tag so a column can move from text to number or date one
 * cell at a time while the pipeline coerces it.
 */

/**
 * A single value at a row/column position
 */
export type Cell =
  | { kind: "missing" }
  | { kind: "text"; value: string }
  | { kind: "number"; value: number }
  | { kind: "date"; value: Date };

export type CellKind = Cell["kind"];

/**
 * What a column currently holds, derived from its non-missing cells
 */
export type ColumnKind = "text" | "numeric" | "date" | "mixed";

export interface Column {
  name: string;
  cells: Cell[];
}

/**
 * Rectangular dataset
 *
 * `rowCount` is kept alongside the columns so that a table whose columns
 * were all pruned still knows how many rows it has.
 */
export interface Table {
  columns: Column[];
  rowCount: number;
}

export const MISSING: Cell = Object.freeze({ kind: "missing" });

export function textCell(value: string): Cell {
  return { kind: "text", value };
}

export function numberCell(value: number): Cell {
  return Number.isFinite(value) ? { kind: "number", value } : MISSING;
}

export function dateCell(value: Date): Cell {
  return Number.isNaN(value.getTime()) ? MISSING : { kind: "date", value };
}

export function isMissing(cell: Cell): boolean {
  return cell.kind === "missing";
}

/**
 * Builds a table after checking that column names are unique and every
 * column has `rowCount` cells.
 *
 * @throws Error if either invariant is violated
 */
export function createTable(columns: Column[], rowCount?: number): Table {
  const rows = rowCount ?? (columns.length > 0 ? columns[0].cells.length : 0);
  const seen = new Set<string>();

  for (const column of columns) {
    if (seen.has(column.name)) {
      throw new Error(`Duplicate column name: ${column.name}`);
    }
    seen.add(column.name);

    if (column.cells.length !== rows) {
      throw new Error(
        `Column "${column.name}" has ${column.cells.length} cells, expected ${rows}`
      );
    }
  }

  return { columns, rowCount: rows };
}

/**
 * Builds a table from a header and row-major records.
 * Records shorter than the header are padded with missing cells.
 */
export function tableFromRows(header: string[], rows: Cell[][]): Table {
  const columns: Column[] = header.map((name, colIndex) => ({
    name,
    cells: rows.map(row => row[colIndex] ?? MISSING)
  }));
  return createTable(columns, rows.length);
}

export function getRow(table: Table, rowIndex: number): Cell[] {
  return table.columns.map(column => column.cells[rowIndex]);
}

export function getRows(table: Table): Cell[][] {
  const rows: Cell[][] = [];
  for (let r = 0; r < table.rowCount; r++) {
    rows.push(getRow(table, r));
  }
  return rows;
}

/**
 * Keeps only the rows whose index passes the predicate
 */
export function selectRows(table: Table, keep: (rowIndex: number) => boolean): Table {
  const kept: number[] = [];
  for (let r = 0; r < table.rowCount; r++) {
    if (keep(r)) kept.push(r);
  }

  return {
    columns: table.columns.map(column => ({
      name: column.name,
      cells: kept.map(r => column.cells[r])
    })),
    rowCount: kept.length
  };
}

/**
 * Returns a table with one column's cells replaced
 */
export function replaceColumn(table: Table, name: string, cells: Cell[]): Table {
  return {
    columns: table.columns.map(column =>
      column.name === name ? { name, cells } : column
    ),
    rowCount: table.rowCount
  };
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  switch (a.kind) {
    case "missing":
      return b.kind === "missing";
    case "text":
      return b.kind === "text" && a.value === b.value;
    case "number":
      return b.kind === "number" && a.value === b.value;
    case "date":
      return b.kind === "date" && a.value.getTime() === b.value.getTime();
  }
}

/**
 * Stable string key for a cell; equal cells share a key
 */
export function cellKey(cell: Cell): string {
  switch (cell.kind) {
    case "missing":
      return "m";
    case "text":
      return `t:${cell.value}`;
    case "number":
      // -0 and 0 compare equal
      return `n:${cell.value === 0 ? 0 : cell.value}`;
    case "date":
      return `d:${cell.value.getTime()}`;
  }
}

/**
 * Key for a whole row; used for duplicate detection
 */
export function rowKey(cells: Cell[]): string {
  return JSON.stringify(cells.map(cellKey));
}

/**
 * Text form of a cell as it would read in a spreadsheet. Dates use their
 * ISO representation.
 */
export function cellToString(cell: Cell): string {
  switch (cell.kind) {
    case "missing":
      return "";
    case "text":
      return cell.value;
    case "number":
      return String(cell.value);
    case "date":
      return cell.value.toISOString();
  }
}

export function columnKind(cells: Cell[]): ColumnKind {
  const kinds = new Set<CellKind>();
  for (const cell of cells) {
    if (cell.kind !== "missing") kinds.add(cell.kind);
  }

  if (kinds.size > 1) return "mixed";
  if (kinds.has("number")) return "numeric";
  if (kinds.has("date")) return "date";
  return "text";
}

/**
 * Text and mixed columns are the ones the string-oriented passes touch
 */
export function holdsText(column: Column): boolean {
  const kind = columnKind(column.cells);
  return kind === "text" || kind === "mixed";
}

export function tablesEqual(a: Table, b: Table): boolean {
  if (a.rowCount !== b.rowCount || a.columns.length !== b.columns.length) {
    return false;
  }

  return a.columns.every((column, c) => {
    const other = b.columns[c];
    return (
      column.name === other.name &&
      column.cells.every((cell, r) => cellsEqual(cell, other.cells[r]))
    );
  });
}
