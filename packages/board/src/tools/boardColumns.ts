/**
 * board_columns tool - Show the board's columns with their load.
 */

import { successResponse } from "@agile-board/core";
import type { ToolRegistrar } from "./types.js";
import { toJson } from "./types.js";

export const registerBoardColumns: ToolRegistrar = (server, service) => {
  server.registerTool(
    "board_columns",
    {
      title: "List columns",
      description: "List columns in workflow order with points, card count and WIP limit.",
    },
    async () => {
      const summary = service.getSummary();
      return successResponse(toJson(summary), { ...summary });
    }
  );
};
