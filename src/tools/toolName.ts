/**
 * Tool name definitions and type guards
 *
 * Centralizes the MCP tool names for type safety and runtime validation.
 */

/**
 * Array of all available tool names
 */
export const TOOL_NAMES = [
  "profile_dataset",
  "clean_dataset"
] as const;

/**
 * Union type of all valid tool names
 *
 * @example
 * ```typescript
 * const toolName: ToolName = "clean_dataset"; // Valid
 * const invalid: ToolName = "invalid_tool"; // Type error
 * ```
 */
export type ToolName = typeof TOOL_NAMES[number];

/**
 * Type guard to check if a string is a valid tool name
 *
 * @param value - The string to check
 * @returns True if the value is a valid ToolName
 */
export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some(name => name === value);
}
