/**
 * Legacy Excel (.xls) Loader
 *
 * ExcelJS only reads the OOXML format, so binary workbooks go through
 * SheetJS instead.
 */

import * as XLSX from "xlsx";
import { Err, Ok, Result } from "ts-results-es";
import { Cell, MISSING, Table, dateCell, numberCell, tableFromRows, textCell } from "../cleaning/table.js";
import { LoadError, describeError, loadError } from "../utils/errorHandling.js";
import { cellFromText, normalizeHeaders } from "./headers.js";

/**
 * SheetJS builds dates from local wall-clock fields; re-read those fields
 * as UTC so the result matches what the sheet displays.
 */
function wallClockToUtc(date: Date): Date {
  return new Date(Date.UTC(
    date.getFullYear(),
    date.getMonth(),
    date.getDate(),
    date.getHours(),
    date.getMinutes(),
    date.getSeconds(),
    date.getMilliseconds()
  ));
}

export function cellFromSheetJs(value: unknown): Cell {
  if (value === null || value === undefined) {
    return MISSING;
  }
  if (typeof value === "number") {
    return numberCell(value);
  }
  if (typeof value === "string") {
    return cellFromText(value);
  }
  if (typeof value === "boolean") {
    return textCell(value ? "TRUE" : "FALSE");
  }
  if (value instanceof Date) {
    return dateCell(wallClockToUtc(value));
  }
  return MISSING;
}

function headerText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return wallClockToUtc(value).toISOString();
  return String(value);
}

/**
 * Convert rows of raw SheetJS values (header first) into a table
 */
export function rowsToTable(rows: unknown[][]): Table | null {
  const [headerRow, ...records] = rows;
  if (!headerRow || headerRow.length === 0) {
    return null;
  }

  const header = normalizeHeaders(headerRow.map(headerText));
  const body = records.map(record =>
    header.map((_, index) => cellFromSheetJs(record[index]))
  );

  while (body.length > 0 && body[body.length - 1].every(cell => cell.kind === "missing")) {
    body.pop();
  }

  return tableFromRows(header, body);
}

/**
 * Read a legacy .xls workbook from bytes
 *
 * @param bytes - Workbook contents
 * @returns The first worksheet as a table with its name, or an error
 */
export function readXls(bytes: Uint8Array): Result<{ table: Table; sheetName: string }, LoadError> {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(bytes, { type: "array", cellDates: true });
  } catch (error) {
    return Err(loadError("unreadable", "Could not read Excel workbook", {
      error: describeError(error)
    }));
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (sheetName === undefined || !sheet) {
    return Err(loadError("malformed", "Workbook contains no worksheets"));
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: true
  });

  const table = rowsToTable(rows);
  if (!table) {
    return Err(loadError("malformed", "No columns to parse from file", { sheetName }));
  }

  return Ok({ table, sheetName });
}
