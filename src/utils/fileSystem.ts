/**
 * File system utilities
 *
 * Input classification, output naming and the write-then-rename helper
 * used for reports.
 */

import * as path from "path";
import * as fs from "fs/promises";
import { rmSync } from "fs";

/**
 * Formats the loader understands, keyed by lowercase extension
 */
export type DataFileFormat = "csv" | "xlsx" | "xls";

const FORMATS_BY_EXTENSION: Record<string, DataFileFormat> = {
  ".csv": "csv",
  ".xlsx": "xlsx",
  ".xls": "xls"
};

/**
 * Classifies an input file by extension
 *
 * @param filePath - Path to the input file
 * @returns The data format, or null if the extension is not supported
 */
export function detectFormat(filePath: string): DataFileFormat | null {
  return FORMATS_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? null;
}

/**
 * Formats a timestamp as YYYYMMDD_HHMMSS in local time
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Default report path: `<input base>_cleaned_<timestamp>.xlsx` inside the
 * output directory
 *
 * @example
 * ```typescript
 * defaultOutputPath("data/sales.csv", ".", new Date(2024, 0, 15, 9, 30, 5));
 * // "sales_cleaned_20240115_093005.xlsx"
 * ```
 */
export function defaultOutputPath(inputPath: string, outputDir: string, now = new Date()): string {
  const baseName = path.basename(inputPath, path.extname(inputPath));
  return path.join(outputDir, `${baseName}_cleaned_${formatTimestamp(now)}.xlsx`);
}

const inFlightWrites = new Set<string>();

/**
 * Writes data to a temporary sibling and renames it into place, so the
 * target either holds the full file or is left untouched.
 */
export async function writeFileAtomic(filePath: string, data: Uint8Array): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  inFlightWrites.add(tempPath);
  try {
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  } finally {
    inFlightWrites.delete(tempPath);
  }
}

/**
 * Synchronously removes temporary files of writes still in progress.
 * Called from signal handlers, where nothing async gets to run.
 */
export function removeInFlightWrites(): void {
  for (const tempPath of inFlightWrites) {
    rmSync(tempPath, { force: true });
  }
  inFlightWrites.clear();
}

/**
 * Formats a file size in bytes to a human-readable string
 *
 * @param bytes - File size in bytes
 * @returns Formatted string (e.g., "1.5 MB")
 */
export function formatFileSize(bytes: number): string {
  if (bytes === 0) return "0 B";

  const units = ["B", "KB", "MB", "GB"];
  const k = 1024;
  const i = Math.floor(Math.log(bytes) / Math.log(k));
  const size = bytes / Math.pow(k, i);

  return `${size.toFixed(i > 0 ? 1 : 0)} ${units[i]}`;
}

/**
 * Checks if a path exists. Readability is left to whoever opens it.
 *
 * @param filePath - Path to check
 * @returns True if something exists at the path
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}
