/**
 * Summary sheet layout
 *
 * The before/after report is a fixed sequence of four-cell rows. Any
 * renderer can reproduce the Summary sheet from these rows alone.
 */

import { TableStats } from "./statistics.js";

export type SummaryValue = string | number;

export type SummaryRow = [SummaryValue, SummaryValue, SummaryValue, SummaryValue];

/** 1-based row numbers of the header rows in the summary layout */
export const SUMMARY_HEADER_ROWS = [1, 9, 10] as const;

export const METRIC_HEADER: SummaryRow = ["Metric", "Original", "Cleaned", "Change"];
export const COLUMN_SECTION_LABEL: SummaryRow = ["Column Statistics", "", "", ""];
export const COLUMN_HEADER: SummaryRow = ["Column Name", "Unique Values", "Null Count", "Data Type"];

function compared(label: string, original: number, cleaned: number): SummaryRow {
  return [label, original, cleaned, cleaned - original];
}

function removed(label: string, original: number): SummaryRow {
  return [label, original, 0, 0 - original];
}

/**
 * Builds the summary rows from the pre- and post-cleaning statistics.
 * Column rows follow the cleaned table's column order.
 */
export function buildSummaryRows(original: TableStats, cleaned: TableStats): SummaryRow[] {
  const rows: SummaryRow[] = [
    METRIC_HEADER,
    compared("Total Rows", original.totalRows, cleaned.totalRows),
    compared("Total Columns", original.totalColumns, cleaned.totalColumns),
    removed("Empty Rows Removed", original.emptyRows),
    removed("Empty Columns Removed", original.emptyColumns),
    removed("Duplicate Rows Removed", original.duplicateRows),
    compared("Total Empty Cells", original.totalEmptyCells, cleaned.totalEmptyCells),
    ["", "", "", ""],
    COLUMN_SECTION_LABEL,
    COLUMN_HEADER
  ];

  for (const name of cleaned.columnNames) {
    const stats = cleaned.columns[name];
    rows.push([name, stats.uniqueValues, stats.nullCount, stats.dataType]);
  }

  return rows;
}
