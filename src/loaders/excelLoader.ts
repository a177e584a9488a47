/**
 * Excel Loader
 *
 * Reads the first worksheet of an .xlsx workbook into a table. The first
 * row holds the column names.
 */

import ExcelJS from "exceljs";
import { Err, Ok, Result } from "ts-results-es";
import { Cell, MISSING, Table, dateCell, numberCell, tableFromRows, textCell } from "../cleaning/table.js";
import { LoadError, describeError, loadError } from "../utils/errorHandling.js";
import { createLogger } from "../utils/logger.js";
import { cellFromText, normalizeHeaders } from "./headers.js";

const log = createLogger("excelLoader");

/**
 * Convert an ExcelJS cell value into a table cell
 *
 * Formulas contribute their cached result, rich text and hyperlinks their
 * plain text, booleans become TRUE/FALSE text and error values are missing.
 */
export function cellFromExcel(value: ExcelJS.CellValue): Cell {
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
    return dateCell(value);
  }
  if ("formula" in value || "sharedFormula" in value) {
    return cellFromExcel(value.result ?? null);
  }
  if ("richText" in value) {
    return cellFromText(value.richText.map(run => run.text).join(""));
  }
  if ("hyperlink" in value) {
    return cellFromText(String(value.text));
  }
  return MISSING;
}

function headerText(value: ExcelJS.CellValue): string | null {
  const cell = cellFromExcel(value);
  switch (cell.kind) {
    case "missing":
      return null;
    case "text":
      return cell.value;
    case "number":
      return String(cell.value);
    case "date":
      return cell.value.toISOString();
  }
}

/**
 * Convert a worksheet into a table. Trailing rows with no values are
 * dropped; empty rows in between are kept.
 */
export function worksheetToTable(worksheet: ExcelJS.Worksheet): Table {
  const colCount = worksheet.columnCount || 0;
  const headerRow = worksheet.getRow(1);

  const rawHeaders: Array<string | null> = [];
  for (let col = 1; col <= colCount; col++) {
    rawHeaders.push(headerText(headerRow.getCell(col).value));
  }
  const header = normalizeHeaders(rawHeaders);

  const rows: Cell[][] = [];
  for (let r = 2; r <= worksheet.rowCount; r++) {
    const row = worksheet.getRow(r);
    const cells: Cell[] = [];
    for (let col = 1; col <= colCount; col++) {
      cells.push(cellFromExcel(row.getCell(col).value));
    }
    rows.push(cells);
  }

  while (rows.length > 0 && rows[rows.length - 1].every(cell => cell.kind === "missing")) {
    rows.pop();
  }

  return tableFromRows(header, rows);
}

/**
 * Read an .xlsx workbook from bytes
 *
 * @param bytes - Workbook contents
 * @returns The first worksheet as a table with its name, or an error
 */
export async function readXlsx(
  bytes: Uint8Array
): Promise<Result<{ table: Table; sheetName: string }, LoadError>> {
  const workbook = new ExcelJS.Workbook();

  try {
    await workbook.xlsx.load(Buffer.from(bytes));
  } catch (error) {
    return Err(loadError("unreadable", "Could not read Excel workbook", {
      error: describeError(error)
    }));
  }

  const worksheet = workbook.worksheets[0];
  if (!worksheet) {
    return Err(loadError("malformed", "Workbook contains no worksheets"));
  }
  if (worksheet.columnCount === 0) {
    return Err(loadError("malformed", "No columns to parse from file", {
      sheetName: worksheet.name
    }));
  }

  log.debug(`Reading sheet "${worksheet.name}" (${worksheet.rowCount} rows, ${worksheet.columnCount} columns)`);
  return Ok({ table: worksheetToTable(worksheet), sheetName: worksheet.name });
}
