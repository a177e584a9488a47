/**
 * Profile Dataset Tool
 *
 * Loads a CSV or Excel file and reports its statistics without cleaning
 * or writing anything.
 */

import { z } from "zod";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { Ok } from "ts-results-es";
import { Tool } from "../tool.js";
import { computeStats } from "../../cleaning/statistics.js";
import { isDateColumn } from "../../cleaning/detection.js";
import { loadTable } from "../../loaders/loadTable.js";
import { createLoadErrorResult, createSuccessResult, createErrorResult, describeError } from "../../utils/errorHandling.js";
import { createLogger } from "../../utils/logger.js";

const log = createLogger("profile_dataset");

/**
 * Parameter schema for profileDataset tool
 */
const paramsSchema = z.object({
  inputPath: z.string()
    .min(1, "Input path cannot be empty")
    .describe("Path to a .csv, .xlsx or .xls file")
});

type ProfileDatasetParams = z.infer<typeof paramsSchema>;

/**
 * Factory function to create the profileDataset tool
 *
 * @param server - The MCP server instance
 * @returns Configured Tool instance
 */
export function profileDatasetTool(server: Server): Tool<ProfileDatasetParams> {
  return new Tool<ProfileDatasetParams>({
    server,
    name: "profile_dataset",
    description: "Loads a CSV or Excel file and returns its data-quality statistics: " +
      "row and column counts, fully empty rows and columns, duplicate rows, empty cells, " +
      "and per-column unique values, null counts and current data type. " +
      "Also lists the columns that cleaning would parse as dates. Nothing is written.",
    paramsSchema,
    annotations: {
      title: "Profile Dataset",
      readOnlyHint: true
    },

    callback: async (args: ProfileDatasetParams): Promise<Ok<CallToolResult>> => {
      const { inputPath } = args;

      try {
        log.debug(`Profiling ${inputPath}`);

        const loaded = await loadTable(inputPath);
        if (loaded.isErr()) {
          return createLoadErrorResult(loaded.error);
        }

        const { table, fileName, format, encoding, sheetName } = loaded.value;
        return createSuccessResult({
          fileName,
          format,
          encoding,
          sheetName,
          stats: computeStats(table),
          dateColumns: table.columns.filter(isDateColumn).map(column => column.name)
        });
      } catch (error) {
        return createErrorResult("Unexpected error during profiling", {
          inputPath,
          error: describeError(error)
        });
      }
    }
  });
}
