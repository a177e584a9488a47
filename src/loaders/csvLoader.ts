/**
 * CSV Loader
 *
 * Decodes delimited text and parses it into a table of text cells.
 */

import Papa from "papaparse";
import { Err, Ok, Result } from "ts-results-es";
import { Cell, Table, tableFromRows } from "../cleaning/table.js";
import { LoadError, loadError } from "../utils/errorHandling.js";
import { createLogger } from "../utils/logger.js";
import { cellFromText, normalizeHeaders } from "./headers.js";

const log = createLogger("csvLoader");

/**
 * Encodings tried in order; the first that decodes without error wins
 */
export const CSV_ENCODINGS = ["utf-8", "windows-1252"] as const;

export type CsvEncoding = (typeof CSV_ENCODINGS)[number];

export interface DecodedText {
  text: string;
  encoding: CsvEncoding;
}

const DELIMITERS_TO_GUESS = [",", ";", "\t", "|"];

/**
 * Decode raw bytes with the first encoding that accepts them
 *
 * @param bytes - File contents
 * @returns The decoded text and the encoding used, or a decode_failed error
 */
export function decodeText(
  bytes: Uint8Array,
  encodings: readonly CsvEncoding[] = CSV_ENCODINGS
): Result<DecodedText, LoadError> {
  for (const encoding of encodings) {
    try {
      const text = new TextDecoder(encoding, { fatal: true }).decode(bytes);
      return Ok({ text, encoding });
    } catch (error) {
      log.debug(`Could not decode as ${encoding}:`, error);
    }
  }

  return Err(loadError(
    "decode_failed",
    "Could not decode CSV file with any supported encoding",
    { tried: [...encodings] }
  ));
}

/**
 * Parse CSV text into a table
 *
 * The first record is the header. Blank lines are skipped, quoted fields
 * may hold delimiters and newlines, and the delimiter is guessed from
 * `,` `;` tab and `|`. Records shorter than the header are padded with
 * missing cells; longer records are rejected.
 *
 * @param text - Decoded CSV content
 * @returns The table, or a malformed error
 */
export function parseCsvText(text: string): Result<Table, LoadError> {
  const result = Papa.parse<string[]>(text, {
    header: false,
    skipEmptyLines: true,
    delimitersToGuess: DELIMITERS_TO_GUESS
  });

  const quoteError = result.errors.find(error => error.type === "Quotes");
  if (quoteError) {
    return Err(loadError("malformed", `Malformed CSV: ${quoteError.message}`, {
      row: quoteError.row
    }));
  }

  const [headerRecord, ...records] = result.data;
  if (!headerRecord) {
    return Err(loadError("malformed", "No columns to parse from file"));
  }

  const header = normalizeHeaders(headerRecord);
  const rows: Cell[][] = [];

  for (let i = 0; i < records.length; i++) {
    const record = records[i];
    if (record.length > header.length) {
      return Err(loadError(
        "malformed",
        `Expected ${header.length} fields in record ${i + 2}, saw ${record.length}`,
        { record: i + 2 }
      ));
    }
    rows.push(record.map(cellFromText));
  }

  log.debug(`Parsed ${rows.length} records with delimiter ${JSON.stringify(result.meta.delimiter)}`);
  return Ok(tableFromRows(header, rows));
}

/**
 * Decode and parse CSV bytes
 */
export function readCsv(bytes: Uint8Array): Result<{ table: Table; encoding: CsvEncoding }, LoadError> {
  const decoded = decodeText(bytes);
  if (decoded.isErr()) {
    return decoded;
  }

  const parsed = parseCsvText(decoded.value.text);
  if (parsed.isErr()) {
    return parsed;
  }

  return Ok({ table: parsed.value, encoding: decoded.value.encoding });
}
