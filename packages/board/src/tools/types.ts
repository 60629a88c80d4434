/**
 * Shared types for board tool registration.
 */

import type { McpServer } from "@agile-board/core";
import type { BoardService } from "../core/BoardService.js";

/**
 * Function type for registering a tool with an MCP server.
 */
export interface ToolRegistrar {
  (server: McpServer, service: BoardService): void;
}

/**
 * Pretty JSON for the text block of a response.
 */
export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
