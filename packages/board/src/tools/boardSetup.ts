/**
 * board_setup tool - Replace the board with a new column layout.
 */

import * as z from "zod/v4";
import { resultToStructuredResponse } from "@agile-board/core";
import type { ToolRegistrar } from "./types.js";
import { toJson } from "./types.js";
import { ColumnDefinitionSchema } from "./schemas.js";

export const registerBoardSetup: ToolRegistrar = (server, service) => {
  server.registerTool(
    "board_setup",
    {
      title: "Set up board",
      description: `Replace the board with a new set of columns. Drops every tracked card.

Exactly one column must be "starting" and exactly one "done".
Column ids must be unique.`,
      inputSchema: {
        columns: z.array(ColumnDefinitionSchema).describe("Columns in workflow order"),
      },
    },
    async (input) => {
      const result = service.setup(input.columns);
      return resultToStructuredResponse(result, (summary) => ({
        text: toJson(summary),
        data: { ...summary },
      }));
    }
  );
};
