/**
 * Error handling utilities
 *
 * Load failures travel as `LoadError` values inside a `Result` rather than
 * as thrown exceptions. The helpers below turn them, and any other caught
 * error, into the text shown on the command line and in MCP tool results.
 */

import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { Ok } from "ts-results-es";

/**
 * Why a dataset could not be loaded
 */
export type LoadErrorKind =
  | "not_found"
  | "unsupported_format"
  | "decode_failed"
  | "unreadable"
  | "malformed";

export interface LoadError {
  kind: LoadErrorKind;
  message: string;
  details?: Record<string, unknown>;
}

export function loadError(
  kind: LoadErrorKind,
  message: string,
  details?: Record<string, unknown>
): LoadError {
  return details ? { kind, message, details } : { kind, message };
}

/**
 * Formats a message and optional details the same way everywhere
 *
 * @example
 * ```typescript
 * formatErrorText("Unsupported file format: .txt", { filePath: "data.txt" });
 * // "Error: Unsupported file format: .txt\n\nDetails: {\n  \"filePath\": \"data.txt\"\n}"
 * ```
 */
export function formatErrorText(message: string, details?: Record<string, unknown>): string {
  return details
    ? `Error: ${message}\n\nDetails: ${JSON.stringify(details, null, 2)}`
    : `Error: ${message}`;
}

/**
 * Extracts a readable message from anything that was thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error);
}

/**
 * Node's system errors carry a `code` such as ENOENT or EACCES
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Creates a standardized error result for MCP tool responses
 *
 * @param message - The error message to display
 * @param details - Optional additional error details
 * @returns An Ok result containing the error information
 */
export function createErrorResult(
  message: string,
  details?: Record<string, unknown>
): Ok<CallToolResult> {
  return Ok({
    content: [
      {
        type: "text",
        text: formatErrorText(message, details)
      }
    ],
    isError: true
  });
}

/**
 * Creates an MCP error result from a load failure
 */
export function createLoadErrorResult(error: LoadError): Ok<CallToolResult> {
  return createErrorResult(error.message, { kind: error.kind, ...error.details });
}

/**
 * Creates a standardized success result for MCP tool responses
 *
 * @param data - The data to return (will be stringified if not a string)
 */
export function createSuccessResult(data: unknown): Ok<CallToolResult> {
  const text = typeof data === "string"
    ? data
    : JSON.stringify(data, null, 2);

  return Ok({
    content: [
      {
        type: "text",
        text
      }
    ],
    isError: false
  });
}
