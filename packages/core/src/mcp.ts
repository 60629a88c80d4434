/**
 * MCP tool response helpers.
 * Every board tool answers with a text block and, where there is data, structured content.
 */

import type { Result } from "./result.js";

export interface TextContent {
  type: "text";
  text: string;
}

/**
 * Shape returned from a tool callback.
 * The index signature keeps it assignable to the SDK's CallToolResult.
 */
export type ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
};

export interface ErrorContent extends Record<string, unknown> {
  success: false;
  error: string;
  code?: string;
}

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

/**
 * Error response. The code, when given, lets agents branch without parsing the message.
 */
export function errorResponse(message: string, code?: string): ToolResponse<ErrorContent> {
  const structuredContent: ErrorContent = { success: false, error: message };
  if (code !== undefined) {
    structuredContent.code = code;
  }
  return {
    content: [{ type: "text", text: code ? `Error [${code}]: ${message}` : `Error: ${message}` }],
    structuredContent,
    isError: true,
  };
}

export function successResponse<T extends Record<string, unknown>>(
  text: string,
  data: T
): ToolResponse<T & { success: true }> {
  return {
    content: [{ type: "text", text }],
    structuredContent: { ...data, success: true },
  };
}

function describeError(error: string | Error): { message: string; code?: string } {
  if (typeof error === "string") {
    return { message: error };
  }
  const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
  return { message: error.message, code };
}

/**
 * Convert a Result into a text response.
 */
export function resultToResponse<T, E extends string | Error>(
  result: Result<T, E>,
  formatter: (value: T) => ToolResponse
): ToolResponse {
  if (result.ok) {
    return formatter(result.value);
  }
  const { message, code } = describeError(result.error);
  return errorResponse(message, code);
}

/**
 * Convert a Result into a response carrying both text and structured data.
 */
export function resultToStructuredResponse<T, E extends string | Error, S extends Record<string, unknown>>(
  result: Result<T, E>,
  formatter: (value: T) => { text: string; data: S }
): ToolResponse<(S & { success: true }) | ErrorContent> {
  if (result.ok) {
    const { text, data } = formatter(result.value);
    return successResponse(text, data);
  }
  const { message, code } = describeError(result.error);
  return errorResponse(message, code);
}
