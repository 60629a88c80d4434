/**
 * Register all board MCP tools.
 */

import type { McpServer } from "@agile-board/core";
import type { BoardService } from "../core/BoardService.js";

import { registerBoardSetup } from "./boardSetup.js";
import { registerBoardColumns } from "./boardColumns.js";
import { registerBoardAdd } from "./boardAdd.js";
import { registerBoardMove } from "./boardMove.js";
import { registerBoardUndo } from "./boardUndo.js";
import { registerBoardRemove } from "./boardRemove.js";
import { registerBoardCards } from "./boardCards.js";
import { registerBoardVelocity } from "./boardVelocity.js";

export function registerBoardTools(server: McpServer, service: BoardService): void {
  registerBoardSetup(server, service);
  registerBoardColumns(server, service);
  registerBoardAdd(server, service);
  registerBoardMove(server, service);
  registerBoardUndo(server, service);
  registerBoardRemove(server, service);
  registerBoardCards(server, service);
  registerBoardVelocity(server, service);
}
