/**
 * Tool factory registry
 *
 * Central registry of all tool factories. Import and add new tool
 * factory functions here to make them available to the MCP server.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { RegisteredTool } from "./tool.js";
import { profileDatasetTool } from "./profileDataset/profileDataset.js";
import { cleanDatasetTool } from "./cleanDataset/cleanDataset.js";

/**
 * A tool factory takes a Server instance and returns a configured tool
 */
export type ToolFactory = (server: Server) => RegisteredTool;

/**
 * Array of all tool factory functions
 *
 * The server will automatically register all tools in this array.
 */
export const toolFactories: ToolFactory[] = [
  profileDatasetTool,
  cleanDatasetTool
];
