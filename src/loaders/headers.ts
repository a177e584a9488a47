/**
 * Header normalization shared by the CSV and spreadsheet loaders
 */

import { Cell, MISSING, textCell } from "../cleaning/table.js";

/**
 * Tokens read as "no value" wherever they appear as a whole cell
 */
export const MISSING_VALUE_TOKENS: ReadonlySet<string> = new Set([
  "",
  "#N/A",
  "#N/A N/A",
  "#NA",
  "-1.#IND",
  "-1.#QNAN",
  "-NaN",
  "-nan",
  "1.#IND",
  "1.#QNAN",
  "<NA>",
  "N/A",
  "NA",
  "NULL",
  "NaN",
  "None",
  "n/a",
  "nan",
  "null"
]);

/**
 * Text cell, or missing when the raw value is a missing-value token
 */
export function cellFromText(raw: string): Cell {
  return MISSING_VALUE_TOKENS.has(raw) ? MISSING : textCell(raw);
}

/**
 * Convert column number to Excel column letter
 * 1 -> A, 2 -> B, 26 -> Z, 27 -> AA, etc.
 *
 * @param col - Column number (1-based)
 * @returns Column letter (A, B, AA, etc.)
 */
export function getColumnLetter(col: number): string {
  let letter = "";
  while (col > 0) {
    const remainder = (col - 1) % 26;
    letter = String.fromCharCode(65 + remainder) + letter;
    col = Math.floor((col - 1) / 26);
  }
  return letter;
}

/**
 * Makes header names usable as column names.
 *
 * Blank headers become `Column_<letter>`; a repeated name gets `.1`, `.2`,
 * ... appended, skipping any suffix already taken.
 *
 * @example
 * ```typescript
 * normalizeHeaders(["id", "", "id", "id"]);
 * // ["id", "Column_B", "id.1", "id.2"]
 * ```
 */
export function normalizeHeaders(raw: Array<string | null | undefined>): string[] {
  const named = raw.map((header, index) =>
    header === null || header === undefined || header.trim() === ""
      ? `Column_${getColumnLetter(index + 1)}`
      : header
  );

  const taken = new Set(named);
  const used = new Set<string>();
  const counters = new Map<string, number>();

  return named.map(name => {
    if (!used.has(name)) {
      used.add(name);
      return name;
    }

    let suffix = counters.get(name) ?? 1;
    let candidate = `${name}.${suffix}`;
    while (used.has(candidate) || taken.has(candidate)) {
      suffix++;
      candidate = `${name}.${suffix}`;
    }
    counters.set(name, suffix + 1);
    used.add(candidate);
    return candidate;
  });
}
