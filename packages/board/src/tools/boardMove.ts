/**
 * board_move tool - Move a card to another column.
 */

import * as z from "zod/v4";
import { resultToStructuredResponse } from "@agile-board/core";
import type { ToolRegistrar } from "./types.js";
import { toJson } from "./types.js";

export const registerBoardMove: ToolRegistrar = (server, service) => {
  server.registerTool(
    "board_move",
    {
      title: "Move card",
      description: "Move a card to another column. Fails if the column's WIP limit would be exceeded.",
      inputSchema: {
        id: z.string().describe("Card ID"),
        column: z.string().describe("Target column ID"),
      },
    },
    async (input) => {
      const result = service.moveCard(input.id, input.column);
      return resultToStructuredResponse(result, (card) => ({
        text: toJson({ moved: true, card }),
        data: { card, velocity: service.velocity() },
      }));
    }
  );
};
