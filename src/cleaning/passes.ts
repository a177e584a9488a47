/**
 * Cleaning passes
 *
 * Each pass takes a table and returns a new one together with a report of
 * what it changed. No pass throws on bad data: a cell the pass cannot
 * interpret becomes missing.
 */

import {
  Cell,
  MISSING,
  Table,
  dateCell,
  holdsText,
  isMissing,
  numberCell,
  replaceColumn,
  rowKey,
  getRow,
  selectRows
} from "./table.js";
import { NUMERIC_PARSE_THRESHOLD, isDateColumn, parseNumeric } from "./detection.js";
import { parseDate } from "./dateParser.js";

/** Text that stands for "no value" once trimmed */
export const PLACEHOLDER_TOKENS: ReadonlySet<string> = new Set(["", "nan"]);

export type Shape = [rows: number, columns: number];

export type PassReport =
  | {
      pass: "structural-pruning";
      shapeBefore: Shape;
      shapeAfter: Shape;
      rowsRemoved: number;
      columnsRemoved: string[];
    }
  | { pass: "text-normalization"; columns: string[]; cellsCleared: number }
  | { pass: "date-standardization"; columns: string[]; cellsCleared: number }
  | { pass: "duplicate-elimination"; rowsRemoved: number }
  | { pass: "numeric-coercion"; columns: string[] };

export type PassName = PassReport["pass"];

export interface PassResult<R extends PassReport = PassReport> {
  table: Table;
  report: R;
}

type ReportOf<N extends PassName> = Extract<PassReport, { pass: N }>;

function shapeOf(table: Table): Shape {
  return [table.rowCount, table.columns.length];
}

/**
 * Pass 1: drops rows whose cells are all missing, then columns whose
 * cells are all missing in the row-pruned table.
 */
export function pruneEmpty(table: Table): PassResult<ReportOf<"structural-pruning">> {
  const rowsPruned = selectRows(table, r => !getRow(table, r).every(isMissing));

  const keptColumns = rowsPruned.columns.filter(column => !column.cells.every(isMissing));
  const columnsRemoved = rowsPruned.columns
    .filter(column => !keptColumns.includes(column))
    .map(column => column.name);

  const pruned: Table = { columns: keptColumns, rowCount: rowsPruned.rowCount };

  return {
    table: pruned,
    report: {
      pass: "structural-pruning",
      shapeBefore: shapeOf(table),
      shapeAfter: shapeOf(pruned),
      rowsRemoved: table.rowCount - rowsPruned.rowCount,
      columnsRemoved
    }
  };
}

/**
 * Pass 2: trims surrounding whitespace from every text cell of text and
 * mixed columns. Values that trim to a placeholder become missing.
 */
export function normalizeText(table: Table): PassResult<ReportOf<"text-normalization">> {
  let result = table;
  let cellsCleared = 0;
  const columns: string[] = [];

  for (const column of table.columns) {
    if (!holdsText(column)) continue;

    columns.push(column.name);
    const cells = column.cells.map((cell): Cell => {
      if (cell.kind !== "text") return cell;

      const trimmed = cell.value.trim();
      if (PLACEHOLDER_TOKENS.has(trimmed)) {
        cellsCleared++;
        return MISSING;
      }
      return trimmed === cell.value ? cell : { kind: "text", value: trimmed };
    });
    result = replaceColumn(result, column.name, cells);
  }

  return { table: result, report: { pass: "text-normalization", columns, cellsCleared } };
}

/**
 * Pass 3: parses the cells of every date-like column. Cells that do not
 * parse become missing.
 */
export function standardizeDates(table: Table): PassResult<ReportOf<"date-standardization">> {
  let result = table;
  let cellsCleared = 0;
  const columns: string[] = [];

  for (const column of table.columns) {
    if (!isDateColumn(column)) continue;

    columns.push(column.name);
    const cells = column.cells.map((cell): Cell => {
      switch (cell.kind) {
        case "missing":
        case "date":
          return cell;
        case "number":
          cellsCleared++;
          return MISSING;
        case "text": {
          const parsed = parseDate(cell.value);
          if (parsed === null) {
            cellsCleared++;
            return MISSING;
          }
          return dateCell(parsed);
        }
      }
    });
    result = replaceColumn(result, column.name, cells);
  }

  return { table: result, report: { pass: "date-standardization", columns, cellsCleared } };
}

/**
 * Pass 4: removes every row equal to an earlier row, keeping the first
 */
export function dropDuplicates(table: Table): PassResult<ReportOf<"duplicate-elimination">> {
  const seen = new Set<string>();
  const deduped = selectRows(table, r => {
    const key = rowKey(getRow(table, r));
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  return {
    table: deduped,
    report: { pass: "duplicate-elimination", rowsRemoved: table.rowCount - deduped.rowCount }
  };
}

/**
 * Pass 5: converts text and mixed columns to numbers when more than half
 * of their non-missing cells parse once `,`, `$` and `%` are stripped.
 */
export function coerceNumeric(table: Table): PassResult<ReportOf<"numeric-coercion">> {
  let result = table;
  const columns: string[] = [];

  for (const column of table.columns) {
    if (!holdsText(column)) continue;

    const present = column.cells.filter(cell => !isMissing(cell)).length;
    if (present === 0) continue;

    const parsed = column.cells.map(toNumber);
    const numeric = parsed.filter(value => value !== null).length;

    if (numeric / present > NUMERIC_PARSE_THRESHOLD) {
      columns.push(column.name);
      result = replaceColumn(
        result,
        column.name,
        parsed.map(value => (value === null ? MISSING : numberCell(value)))
      );
    }
  }

  return { table: result, report: { pass: "numeric-coercion", columns } };
}

function toNumber(cell: Cell): number | null {
  switch (cell.kind) {
    case "number":
      return cell.value;
    case "text":
      return parseNumeric(cell.value);
    default:
      return null;
  }
}

/**
 * The five passes in the order they run
 */
export const PASSES: ReadonlyArray<(table: Table) => PassResult> = [
  pruneEmpty,
  normalizeText,
  standardizeDates,
  dropDuplicates,
  coerceNumeric
];
