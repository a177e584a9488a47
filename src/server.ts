/**
 * MCP Server setup and configuration
 *
 * Creates the MCP server instance and registers every tool from the
 * factory registry.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema
} from "@modelcontextprotocol/sdk/types.js";
import { toolFactories } from "./tools/tools.js";
import { isToolName } from "./tools/toolName.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("Server");

export const SERVER_INFO = {
  name: "tabular-cleanup-mcp-server",
  version: "1.0.0"
} as const;

/**
 * Creates and configures the MCP server instance
 *
 * @returns Configured Server instance ready to connect to a transport
 *
 * @example
 * ```typescript
 * const server = createServer();
 * const transport = new StdioServerTransport();
 * await server.connect(transport);
 * ```
 */
export function createServer(): Server {
  const server = new Server(
    { ...SERVER_INFO },
    {
      capabilities: {
        tools: {}
      }
    }
  );

  registerTools(server);

  return server;
}

/**
 * Registers the list and call handlers for all tools
 *
 * @param server - The MCP server instance to register tools with
 */
function registerTools(server: Server): void {
  const tools = toolFactories.map(factory => factory(server));
  log.debug(`Instantiated ${tools.length} tools`);

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: tools.map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema(),
        annotations: tool.annotations
      }))
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const toolName = request.params.name;
    const tool = isToolName(toolName) ? tools.find(t => t.name === toolName) : undefined;

    if (!tool) {
      throw new Error(`Unknown tool: ${toolName}`);
    }

    log.info(`Calling tool: ${toolName}`);

    const result = await tool.execute(request.params.arguments);
    return result.value;
  });
}
