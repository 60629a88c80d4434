/**
 * board_remove tool - Stop tracking a card.
 */

import * as z from "zod/v4";
import { resultToStructuredResponse } from "@agile-board/core";
import type { ToolRegistrar } from "./types.js";
import { toJson } from "./types.js";

export const registerBoardRemove: ToolRegistrar = (server, service) => {
  server.registerTool(
    "board_remove",
    {
      title: "Remove card",
      description: "Remove a card from the iteration.",
      inputSchema: {
        id: z.string().describe("Card ID"),
      },
    },
    async (input) => {
      const result = service.removeCard(input.id);
      return resultToStructuredResponse(result, (card) => ({
        text: toJson({ removed: true, card }),
        data: { card },
      }));
    }
  );
};
