/**
 * Column-type detection heuristics
 *
 * The thresholds and sample size below decide which columns the pipeline
 * reinterprets; changing any of them changes the cleaned output.
 */

import { Cell, Column, cellToString, columnKind } from "./table.js";

/** Number of leading non-missing values inspected for date-like text */
export const DATE_SAMPLE_SIZE = 10;

/** Share of sampled values that must look like dates (strictly greater) */
export const DATE_MATCH_THRESHOLD = 0.7;

/** Share of non-missing values that must parse as numbers (strictly greater) */
export const NUMERIC_PARSE_THRESHOLD = 0.5;

/** Column-name fragments that mark a column as holding dates */
export const DATE_NAME_KEYWORDS = [
  "date",
  "time",
  "created",
  "updated",
  "modified",
  "birth",
  "dob"
] as const;

/**
 * Date-like shapes, anchored at the start of the trimmed value only
 */
export const DATE_LIKE_PATTERNS: readonly RegExp[] = [
  /^\d{4}-\d{1,2}-\d{1,2}/, // YYYY-MM-DD
  /^\d{1,2}\/\d{1,2}\/\d{4}/, // MM/DD/YYYY or DD/MM/YYYY
  /^\d{1,2}-\d{1,2}-\d{4}/, // MM-DD-YYYY or DD-MM-YYYY
  /^\d{4}\/\d{1,2}\/\d{1,2}/ // YYYY/MM/DD
];

/** Characters removed before a numeric parse is attempted */
const NUMERIC_NOISE = /[,$%]/g;

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function nameSuggestsDate(name: string): boolean {
  const lower = name.toLowerCase();
  return DATE_NAME_KEYWORDS.some(keyword => lower.includes(keyword));
}

export function looksLikeDate(value: string): boolean {
  const trimmed = value.trim();
  return DATE_LIKE_PATTERNS.some(pattern => pattern.test(trimmed));
}

/**
 * First `DATE_SAMPLE_SIZE` non-missing cells, in row order, as text
 */
export function sampleValues(cells: Cell[]): string[] {
  const sample: string[] = [];
  for (const cell of cells) {
    if (sample.length >= DATE_SAMPLE_SIZE) break;
    if (cell.kind !== "missing") sample.push(cellToString(cell));
  }
  return sample;
}

/**
 * Decides whether a column should be parsed as dates.
 *
 * A column qualifies when it is not already all dates and either its name
 * contains a date keyword or more than 70% of its leading sample looks
 * like a date.
 */
export function isDateColumn(column: Column): boolean {
  if (columnKind(column.cells) === "date") {
    return false;
  }

  if (nameSuggestsDate(column.name)) {
    return true;
  }

  const sample = sampleValues(column.cells);
  if (sample.length === 0) {
    return false;
  }

  const dateLike = sample.filter(looksLikeDate).length;
  return dateLike / sample.length > DATE_MATCH_THRESHOLD;
}

/**
 * Parses a text value as a number after removing `,`, `$` and `%`.
 *
 * @returns The parsed number, or null when the remainder is not a decimal
 */
export function parseNumeric(value: string): number | null {
  const stripped = value.replace(NUMERIC_NOISE, "").trim();
  if (!DECIMAL.test(stripped)) {
    return null;
  }

  const parsed = Number(stripped);
  return Number.isFinite(parsed) ? parsed : null;
}
