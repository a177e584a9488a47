/**
 * Load, clean and report in one call
 *
 * Shared by the command line and the MCP tools. Progress lines come back
 * with the result instead of being printed, so each caller decides where
 * they go.
 */

import { Err, Ok, Result } from "ts-results-es";
import { CleaningResult, RoundReport, runCleaning, summarize } from "./cleaning/pipeline.js";
import { SummaryRow } from "./cleaning/summary.js";
import { getConfig } from "./config.js";
import { loadTable } from "./loaders/loadTable.js";
import { LoadedTable } from "./loaders/types.js";
import { ReportOptions, ReportOutcome, writeReport } from "./report/excelReport.js";
import { LoadError, describeError } from "./utils/errorHandling.js";
import { defaultOutputPath } from "./utils/fileSystem.js";

export interface CleanupRequest {
  inputPath: string;
  outputPath?: string;
  /** Used for the default output file name */
  now?: Date;
}

export interface CleanupOutcome {
  loaded: LoadedTable;
  result: CleaningResult;
  summary: SummaryRow[];
  report: ReportOutcome;
  progress: string[];
}

export type CleanupError =
  | { stage: "load"; error: LoadError }
  | { stage: "save"; outputPath: string; message: string };

function shape([rows, columns]: [number, number]): string {
  return `(${rows}, ${columns})`;
}

/**
 * Progress lines for one pass. Passes of later rounds only report when
 * they changed something.
 */
export function describePass(report: RoundReport): string[] {
  const settling = report.round > 1;
  const suffix = settling ? ` (round ${report.round})` : "";

  switch (report.pass) {
    case "structural-pruning":
      if (settling && report.rowsRemoved === 0 && report.columnsRemoved.length === 0) return [];
      return [`✓ Removed empty rows/columns: ${shape(report.shapeBefore)} → ${shape(report.shapeAfter)}${suffix}`];
    case "text-normalization":
      if (settling) return [];
      return [`✓ Stripped whitespace from ${report.columns.length} text columns`];
    case "date-standardization":
      if (report.columns.length === 0) return [];
      return [`✓ Standardized date formats in columns: ${report.columns.join(", ")}${suffix}`];
    case "duplicate-elimination":
      if (report.rowsRemoved === 0) return [];
      return [`✓ Removed ${report.rowsRemoved} duplicate rows${suffix}`];
    case "numeric-coercion":
      return report.columns.map(column => `✓ Converted column '${column}' to numeric${suffix}`);
  }
}

export function describeLoad(loaded: LoadedTable): string {
  const { table } = loaded;
  const source = loaded.encoding
    ? `CSV with ${loaded.encoding} encoding`
    : `Excel file (sheet "${loaded.sheetName ?? ""}")`;
  return `✓ Successfully loaded ${source}\n✓ Loaded ${table.rowCount} rows and ${table.columns.length} columns`;
}

/**
 * Load the input, clean it and write the report
 *
 * @returns The outcome, or the stage that failed and why
 */
export async function cleanupDataset(
  request: CleanupRequest,
  reportOptions?: ReportOptions
): Promise<Result<CleanupOutcome, CleanupError>> {
  const loaded = await loadTable(request.inputPath);
  if (loaded.isErr()) {
    return Err({ stage: "load", error: loaded.error });
  }

  const result = runCleaning(loaded.value.table);
  const summary = summarize(result);
  const outputPath =
    request.outputPath ??
    defaultOutputPath(request.inputPath, getConfig().outputDir, request.now);

  const progress = [
    describeLoad(loaded.value),
    ...result.passes.flatMap(describePass),
    `✓ Data cleanup complete! Final shape: ${shape([result.table.rowCount, result.table.columns.length])}`
  ];

  let report: ReportOutcome;
  try {
    report = await writeReport({ table: result.table, summary }, outputPath, reportOptions);
  } catch (error) {
    return Err({ stage: "save", outputPath, message: describeError(error) });
  }

  if (report.formattingFailed) {
    progress.push("⚠ Warning: report saved without formatting");
  }

  return Ok({ loaded: loaded.value, result, summary, report, progress });
}
