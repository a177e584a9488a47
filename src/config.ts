/**
 * Configuration management for the cleanup tool
 *
 * Provides centralized configuration with environment variable support
 * for customizing logging and report output.
 */

import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Config {
  /**
   * Logging level for diagnostics written to stderr
   * @default "info"
   */
  logLevel: LogLevel;

  /**
   * Directory for reports when no output path is given
   * @default "."
   */
  outputDir: string;

  /**
   * Name of the sheet holding the cleaned table
   * @default "Cleaned Data"
   */
  dataSheetName: string;

  /**
   * Name of the sheet holding the before/after summary
   * @default "Summary"
   */
  summarySheetName: string;

  /**
   * Apply header fills and empty-cell highlighting to the report
   * @default true
   */
  applyFormatting: boolean;
}

// Excel caps sheet names at 31 characters and forbids these
const sheetName = z.string().trim().min(1).max(31).regex(/^[^\\/?*[\]:]+$/);

const envSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).catch("info"),
  CLEANUP_OUTPUT_DIR: z.string().min(1).catch("."),
  CLEANUP_DATA_SHEET: sheetName.catch("Cleaned Data"),
  CLEANUP_SUMMARY_SHEET: sheetName.catch("Summary"),
  CLEANUP_APPLY_FORMATTING: z
    .enum(["true", "false"])
    .transform(value => value === "true")
    .catch(true)
}).transform(env =>
  // exceljs compares worksheet names case-insensitively
  env.CLEANUP_DATA_SHEET.toLowerCase() === env.CLEANUP_SUMMARY_SHEET.toLowerCase()
    ? { ...env, CLEANUP_DATA_SHEET: "Cleaned Data", CLEANUP_SUMMARY_SHEET: "Summary" }
    : env
);

/**
 * Retrieves the current configuration from environment variables.
 * Unset or invalid values fall back to their defaults.
 *
 * @example
 * ```typescript
 * const config = getConfig();
 * console.log(`Reports go to: ${config.outputDir}`);
 * ```
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.parse(env);

  return {
    logLevel: parsed.LOG_LEVEL,
    outputDir: parsed.CLEANUP_OUTPUT_DIR,
    dataSheetName: parsed.CLEANUP_DATA_SHEET,
    summarySheetName: parsed.CLEANUP_SUMMARY_SHEET,
    applyFormatting: parsed.CLEANUP_APPLY_FORMATTING
  };
}
