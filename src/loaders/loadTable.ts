/**
 * Dataset loader entry point
 *
 * Picks a reader by file extension and turns every failure into a
 * `LoadError`, so callers decide how to stop.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { Err, Ok, Result } from "ts-results-es";
import { LoadError, describeError, errorCode, loadError } from "../utils/errorHandling.js";
import { detectFormat } from "../utils/fileSystem.js";
import { createLogger } from "../utils/logger.js";
import { readCsv } from "./csvLoader.js";
import { readXlsx } from "./excelLoader.js";
import { readXls } from "./xlsLoader.js";
import { LoadedTable } from "./types.js";

const log = createLogger("Loader");

/**
 * Load a CSV or Excel file into a table
 *
 * @param filePath - Path to a .csv, .xlsx or .xls file
 * @returns The loaded table with its source details, or the reason it
 *          could not be loaded
 *
 * @example
 * ```typescript
 * const loaded = await loadTable("sales.csv");
 * if (loaded.isErr()) {
 *   console.error(loaded.error.message);
 * }
 * ```
 */
export async function loadTable(filePath: string): Promise<Result<LoadedTable, LoadError>> {
  const format = detectFormat(filePath);
  if (!format) {
    return Err(loadError(
      "unsupported_format",
      `Unsupported file format: ${path.extname(filePath) || "(none)"}`,
      { filePath, supported: [".csv", ".xlsx", ".xls"] }
    ));
  }

  let bytes: Uint8Array;
  try {
    bytes = await fs.readFile(filePath);
  } catch (error) {
    const code = errorCode(error);
    return Err(code === "ENOENT"
      ? loadError("not_found", `Input file '${filePath}' not found`, { filePath })
      : loadError("unreadable", `Could not read '${filePath}'`, {
          filePath,
          error: describeError(error)
        }));
  }

  const source = { fileName: path.basename(filePath), filePath, format };
  log.debug(`Read ${bytes.length} bytes from ${filePath} as ${format}`);

  switch (format) {
    case "csv": {
      const result = readCsv(bytes);
      if (result.isErr()) return result;
      return Ok({ ...source, table: result.value.table, encoding: result.value.encoding });
    }
    case "xlsx": {
      const result = await readXlsx(bytes);
      if (result.isErr()) return result;
      return Ok({ ...source, table: result.value.table, sheetName: result.value.sheetName });
    }
    case "xls": {
      const result = readXls(bytes);
      if (result.isErr()) return result;
      return Ok({ ...source, table: result.value.table, sheetName: result.value.sheetName });
    }
  }
}
