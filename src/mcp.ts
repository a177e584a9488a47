#!/usr/bin/env node

/**
 * Tabular Cleanup MCP Server - Entry Point
 *
 * Serves the dataset tools to MCP clients over stdio:
 * - profile_dataset: statistics of a CSV or Excel file
 * - clean_dataset: clean a file and write the Excel report
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./server.js";
import { createLogger } from "./utils/logger.js";
import { describeError } from "./utils/errorHandling.js";
import { removeInFlightWrites } from "./utils/fileSystem.js";

// stdout is reserved for the MCP protocol; the logger writes to stderr
const log = createLogger("Main");

async function main(): Promise<void> {
  log.info("Starting Tabular Cleanup MCP Server...");

  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);

  log.info("Tabular Cleanup MCP Server running on stdio");
}

process.on("uncaughtException", (error: Error) => {
  log.error("Uncaught exception:", error);
  process.exit(1);
});

process.on("unhandledRejection", (reason: unknown) => {
  log.error("Unhandled rejection:", reason);
  process.exit(1);
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    log.info(`Received ${signal}, shutting down...`);
    removeInFlightWrites();
    process.exit(0);
  });
}

main().catch((error: unknown) => {
  log.error(`Failed to start server: ${describeError(error)}`);
  process.exit(1);
});
