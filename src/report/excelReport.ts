/**
 * Excel report writer
 *
 * Renders a cleaned table and its summary rows into a two-sheet workbook:
 * the cleaned data verbatim, then the before/after summary. Styling is
 * applied on top and never affects the data.
 */

import ExcelJS from "exceljs";
import { Cell, Table, getRows } from "../cleaning/table.js";
import { SUMMARY_HEADER_ROWS, SummaryRow } from "../cleaning/summary.js";
import { getConfig } from "../config.js";
import { describeError } from "../utils/errorHandling.js";
import { writeFileAtomic } from "../utils/fileSystem.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("Report");

export const DATE_NUMBER_FORMAT = "yyyy-mm-dd hh:mm:ss";

/** ARGB fills and font colour used by the report */
export const REPORT_COLORS = {
  dataHeader: "FF366092",
  emptyCell: "FFFFCCCC",
  summaryHeader: "FF70AD47",
  headerFont: "FFFFFFFF"
} as const;

export interface ReportOptions {
  dataSheetName: string;
  summarySheetName: string;
  applyFormatting: boolean;
}

export interface ReportInput {
  table: Table;
  summary: SummaryRow[];
}

export interface ReportOutcome {
  outputPath: string;
  bytesWritten: number;
  /** True when styling failed and the workbook was saved without it */
  formattingFailed: boolean;
}

function reportOptionsFromConfig(): ReportOptions {
  const config = getConfig();
  return {
    dataSheetName: config.dataSheetName,
    summarySheetName: config.summarySheetName,
    applyFormatting: config.applyFormatting
  };
}

function excelValue(cell: Cell): ExcelJS.CellValue {
  return cell.kind === "missing" ? null : cell.value;
}

function solidFill(argb: string): ExcelJS.Fill {
  return { type: "pattern", pattern: "solid", fgColor: { argb }, bgColor: { argb } };
}

const HEADER_FONT: Partial<ExcelJS.Font> = { bold: true, color: { argb: REPORT_COLORS.headerFont } };

/**
 * Build the workbook without styling
 */
export function buildWorkbook(input: ReportInput, options: ReportOptions): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();

  const dataSheet = workbook.addWorksheet(options.dataSheetName);
  dataSheet.addRow(input.table.columns.map(column => column.name));
  for (const row of getRows(input.table)) {
    const added = dataSheet.addRow(row.map(excelValue));
    row.forEach((cell, index) => {
      if (cell.kind === "date") {
        added.getCell(index + 1).numFmt = DATE_NUMBER_FORMAT;
      }
    });
  }

  const summarySheet = workbook.addWorksheet(options.summarySheetName);
  for (const row of input.summary) {
    summarySheet.addRow(row);
  }

  return workbook;
}

/**
 * Apply header fills, bold white header fonts and empty-cell highlighting
 */
export function applyFormatting(workbook: ExcelJS.Workbook, options: ReportOptions): void {
  const dataSheet = workbook.getWorksheet(options.dataSheetName);
  if (dataSheet) {
    const columnCount = dataSheet.getRow(1).cellCount;

    dataSheet.getRow(1).eachCell(cell => {
      cell.fill = solidFill(REPORT_COLORS.dataHeader);
      cell.font = HEADER_FONT;
    });

    for (let r = 2; r <= dataSheet.rowCount; r++) {
      const row = dataSheet.getRow(r);
      for (let c = 1; c <= columnCount; c++) {
        const cell = row.getCell(c);
        if (cell.value === null || cell.value === undefined || String(cell.value).trim() === "") {
          cell.fill = solidFill(REPORT_COLORS.emptyCell);
        }
      }
    }
  }

  const summarySheet = workbook.getWorksheet(options.summarySheetName);
  if (summarySheet) {
    for (const rowNumber of SUMMARY_HEADER_ROWS) {
      summarySheet.getRow(rowNumber).eachCell(cell => {
        if (cell.value !== null && cell.value !== "") {
          cell.fill = solidFill(REPORT_COLORS.summaryHeader);
          cell.font = HEADER_FONT;
        }
      });
    }
  }
}

/**
 * Render the report to bytes. A styling failure is logged and the
 * unstyled workbook is rendered instead.
 */
export async function renderReport(
  input: ReportInput,
  options: ReportOptions = reportOptionsFromConfig()
): Promise<{ buffer: Uint8Array; formattingFailed: boolean }> {
  let formattingFailed = false;
  let workbook = buildWorkbook(input, options);

  if (options.applyFormatting) {
    try {
      applyFormatting(workbook, options);
    } catch (error) {
      log.warn(`Could not apply formatting: ${describeError(error)}`);
      formattingFailed = true;
      workbook = buildWorkbook(input, options);
    }
  }

  const buffer = await workbook.xlsx.writeBuffer();
  return { buffer: new Uint8Array(buffer), formattingFailed };
}

/**
 * Render the report and save it to `outputPath`
 *
 * @throws When the file cannot be written
 */
export async function writeReport(
  input: ReportInput,
  outputPath: string,
  options: ReportOptions = reportOptionsFromConfig()
): Promise<ReportOutcome> {
  const { buffer, formattingFailed } = await renderReport(input, options);
  await writeFileAtomic(outputPath, buffer);
  log.debug(`Wrote ${buffer.byteLength} bytes to ${outputPath}`);

  return { outputPath, bytesWritten: buffer.byteLength, formattingFailed };
}
