#!/usr/bin/env node
/**
 * Agile board MCP server.
 * Holds one in-memory board for the life of the process.
 */

import { runServer } from "@agile-board/core";
import { BoardService } from "./core/BoardService.js";
import { registerBoardTools } from "./tools/registerTools.js";

interface Services {
  board: BoardService;
}

runServer<Services>({
  config: {
    name: "agile-board",
    version: "0.1.0",
  },
  createServices: () => ({
    board: new BoardService(),
  }),
  registerTools: (server, services) => {
    registerBoardTools(server, services.board);
  },
  onStartup: (services) => {
    const columns = services.board.getColumns().map((c) => c.id).join(", ");
    console.error(`[agile-board] Ready. Columns: ${columns}`);
  },
  onShutdown: () => {
    console.error("[agile-board] Shutting down");
  },
});
