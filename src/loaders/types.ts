/**
 * Type definitions for dataset loaders
 */

import { Table } from "../cleaning/table.js";
import { DataFileFormat } from "../utils/fileSystem.js";

/**
 * A table read from disk, with where it came from
 */
export interface LoadedTable {
  table: Table;
  fileName: string;
  filePath: string;
  format: DataFileFormat;
  /** Text encoding that decoded a CSV file */
  encoding?: string;
  /** Worksheet the table was read from */
  sheetName?: string;
}
