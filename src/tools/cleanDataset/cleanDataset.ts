/**
 * Clean Dataset Tool
 *
 * Runs the full cleanup on a file and writes the Excel report.
 */

import { z } from "zod";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { Ok } from "ts-results-es";
import { Tool } from "../tool.js";
import { cleanupDataset } from "../../cleanup.js";
import {
  createErrorResult,
  createLoadErrorResult,
  createSuccessResult,
  describeError
} from "../../utils/errorHandling.js";
import { createLogger } from "../../utils/logger.js";

const log = createLogger("clean_dataset");

/**
 * Parameter schema for cleanDataset tool
 */
const paramsSchema = z.object({
  inputPath: z.string()
    .min(1, "Input path cannot be empty")
    .describe("Path to a .csv, .xlsx or .xls file"),
  outputPath: z.string()
    .min(1)
    .refine(value => value.toLowerCase().endsWith(".xlsx"), "Output file must have an .xlsx extension")
    .optional()
    .describe("Where to write the report (default: <input>_cleaned_<timestamp>.xlsx)")
});

type CleanDatasetParams = z.infer<typeof paramsSchema>;

/**
 * Factory function to create the cleanDataset tool
 *
 * The tool:
 * 1. Loads the input file
 * 2. Removes empty rows/columns, trims text, standardizes dates,
 *    drops duplicate rows and converts number-like text
 * 3. Writes a two-sheet Excel report (cleaned data + summary)
 *
 * @param server - The MCP server instance
 * @returns Configured Tool instance
 */
export function cleanDatasetTool(server: Server): Tool<CleanDatasetParams> {
  return new Tool<CleanDatasetParams>({
    server,
    name: "clean_dataset",
    description: "Cleans a CSV or Excel file and writes an Excel report with a 'Cleaned Data' sheet " +
      "and a 'Summary' sheet comparing the data before and after cleaning. " +
      "Removes fully empty rows and columns, trims whitespace, standardizes date columns, " +
      "drops duplicate rows and converts number-like text ($, %, thousands separators) to numbers. " +
      "Returns the report path, the summary rows and a log of each cleaning step.",
    paramsSchema,
    annotations: {
      title: "Clean Dataset"
    },

    callback: async (args: CleanDatasetParams): Promise<Ok<CallToolResult>> => {
      const { inputPath, outputPath } = args;

      try {
        log.debug(`Cleaning ${inputPath}`);

        const outcome = await cleanupDataset({ inputPath, outputPath });
        if (outcome.isErr()) {
          const failure = outcome.error;
          return failure.stage === "load"
            ? createLoadErrorResult(failure.error)
            : createErrorResult("Could not save Excel report", {
                outputPath: failure.outputPath,
                error: failure.message
              });
        }

        const { report, result, summary, progress } = outcome.value;
        log.debug(`Report written to ${report.outputPath}`);

        return createSuccessResult({
          outputPath: report.outputPath,
          bytesWritten: report.bytesWritten,
          rows: { original: result.original.totalRows, cleaned: result.cleaned.totalRows },
          columns: { original: result.original.totalColumns, cleaned: result.cleaned.totalColumns },
          summary,
          steps: progress
        });
      } catch (error) {
        return createErrorResult("Unexpected error during cleanup", {
          inputPath,
          error: describeError(error)
        });
      }
    }
  });
}
