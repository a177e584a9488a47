/**
 * Base Tool class for MCP server tools
 *
 * Wraps a callback with a Zod schema so arguments arriving from an MCP
 * client are validated before the tool runs.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { Ok } from "ts-results-es";
import { z } from "zod";
import { createErrorResult } from "../utils/errorHandling.js";
import { ToolName } from "./toolName.js";

/**
 * JSON Schema for a tool's arguments, as listed to MCP clients
 */
export interface ToolInputSchema {
  type: "object";
  properties: Record<string, { type: string; description?: string }>;
  required: string[];
  [key: string]: unknown;
}

/**
 * Hints shown to MCP clients alongside the tool
 */
export interface ToolAnnotations {
  title?: string;
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
}

/**
 * Parameters for constructing a Tool instance
 *
 * @template Args - Validated tool arguments
 */
export interface ToolParams<Args> {
  /**
   * MCP server instance
   */
  server: Server;

  /**
   * Unique name for the tool (e.g., "clean_dataset")
   */
  name: ToolName;

  /**
   * Human-readable description of what the tool does
   */
  description: string;

  /**
   * Zod object schema for validating tool parameters
   */
  paramsSchema: z.ZodType<Args, z.ZodTypeDef, unknown>;

  /**
   * Optional metadata annotations for the tool
   */
  annotations?: ToolAnnotations;

  /**
   * Implements the tool's logic on validated arguments
   */
  callback: (args: Args) => Promise<Ok<CallToolResult>>;
}

/**
 * What the server needs from a tool, independent of its argument type
 */
export interface RegisteredTool {
  readonly name: ToolName;
  readonly description: string;
  readonly annotations?: ToolAnnotations;
  inputSchema(): ToolInputSchema;
  execute(args: unknown): Promise<Ok<CallToolResult>>;
}

function unwrap(schema: z.ZodTypeAny): { inner: z.ZodTypeAny; optional: boolean } {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodDefault) {
    return { inner: unwrap(schema._def.innerType).inner, optional: true };
  }
  if (schema instanceof z.ZodEffects) {
    return unwrap(schema._def.schema);
  }
  return { inner: schema, optional: false };
}

function jsonType(schema: z.ZodTypeAny): string {
  if (schema instanceof z.ZodString) return "string";
  if (schema instanceof z.ZodNumber) return "number";
  if (schema instanceof z.ZodBoolean) return "boolean";
  if (schema instanceof z.ZodArray) return "array";
  return "object";
}

/**
 * Base class for all MCP tools
 *
 * Each tool follows the factory pattern: a factory function creates and
 * returns a configured Tool instance.
 *
 * @template Args - Validated tool arguments
 *
 * @example
 * ```typescript
 * const paramsSchema = z.object({
 *   inputPath: z.string().describe("Path to a CSV or Excel file")
 * });
 *
 * export function profileDatasetTool(server: Server) {
 *   return new Tool({
 *     server,
 *     name: "profile_dataset",
 *     description: "Describe a dataset",
 *     paramsSchema,
 *     callback: async (args) => createSuccessResult(await profile(args.inputPath))
 *   });
 * }
 * ```
 */
export class Tool<Args> implements RegisteredTool {
  /**
   * MCP server instance this tool is registered with
   */
  public readonly server: Server;

  /**
   * Unique identifier for this tool
   */
  public readonly name: ToolName;

  /**
   * Human-readable description shown in tool listings
   */
  public readonly description: string;

  /**
   * Zod schema for parameter validation
   */
  public readonly paramsSchema: z.ZodType<Args, z.ZodTypeDef, unknown>;

  /**
   * Optional metadata for the tool
   */
  public readonly annotations?: ToolAnnotations;

  /**
   * Function that executes the tool's logic
   */
  public readonly callback: (args: Args) => Promise<Ok<CallToolResult>>;

  constructor(params: ToolParams<Args>) {
    this.server = params.server;
    this.name = params.name;
    this.description = params.description;
    this.paramsSchema = params.paramsSchema;
    this.annotations = params.annotations;
    this.callback = params.callback;
  }

  /**
   * Parses and validates input arguments using the Zod schema
   *
   * @throws ZodError if validation fails
   */
  public parseArgs(args: unknown): Args {
    return this.paramsSchema.parse(args ?? {});
  }

  /**
   * JSON Schema of the arguments, derived from the Zod shape
   */
  public inputSchema(): ToolInputSchema {
    const properties: ToolInputSchema["properties"] = {};
    const required: string[] = [];
    const schema: z.ZodTypeAny = this.paramsSchema;
    const shape: Record<string, unknown> = schema instanceof z.ZodObject ? schema.shape : {};

    for (const [key, field] of Object.entries(shape)) {
      if (!(field instanceof z.ZodType)) continue;
      const { inner, optional } = unwrap(field);
      properties[key] = field.description
        ? { type: jsonType(inner), description: field.description }
        : { type: jsonType(inner) };
      if (!optional) required.push(key);
    }

    return { type: "object", properties, required };
  }

  /**
   * Validates raw arguments and runs the tool. Invalid arguments come
   * back as an error result rather than an exception.
   */
  async execute(args: unknown): Promise<Ok<CallToolResult>> {
    const parsed = this.paramsSchema.safeParse(args ?? {});
    if (!parsed.success) {
      return createErrorResult("Invalid arguments", {
        tool: this.name,
        issues: parsed.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      });
    }
    return this.callback(parsed.data);
  }
}
