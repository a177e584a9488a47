#!/usr/bin/env node

/**
 * Tabular Cleanup - Command-Line Entry Point
 *
 * Cleans a CSV or Excel file and writes an Excel report:
 * - Empty rows/columns removed, text trimmed
 * - Date-like columns standardized, duplicates dropped
 * - Number-like text columns converted to numbers
 * - A summary sheet comparing the data before and after
 */

import { EXIT_FAILURE, main } from "./cli.js";
import { removeInFlightWrites } from "./utils/fileSystem.js";

/**
 * Handle uncaught exceptions
 */
process.on("uncaughtException", (error: Error) => {
  console.error("✗ Unexpected error:", error);
  process.exit(EXIT_FAILURE);
});

/**
 * Handle unhandled promise rejections
 */
process.on("unhandledRejection", (reason: unknown) => {
  console.error("✗ Unhandled rejection:", reason);
  process.exit(EXIT_FAILURE);
});

/**
 * An interrupt aborts the run; the report is only renamed into place once
 * fully written, so nothing partial is left behind.
 */
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    console.error("\n\n⚠ Process interrupted by user");
    removeInFlightWrites();
    process.exit(EXIT_FAILURE);
  });
}

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("✗ Unexpected error:", error);
    process.exitCode = EXIT_FAILURE;
  }
);
