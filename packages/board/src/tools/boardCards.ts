/**
 * board_cards tool - Cards in one column.
 */

import * as z from "zod/v4";
import { resultToStructuredResponse } from "@agile-board/core";
import type { ToolRegistrar } from "./types.js";
import { toJson } from "./types.js";

export const registerBoardCards: ToolRegistrar = (server, service) => {
  server.registerTool(
    "board_cards",
    {
      title: "Cards in column",
      description: "List the cards in a column, in the order they were added.",
      inputSchema: {
        column: z.string().describe("Column ID"),
      },
    },
    async (input) => {
      const result = service.getCardsIn(input.column);
      return resultToStructuredResponse(result, (cards) => ({
        text: toJson(cards),
        data: { cards, total: cards.length },
      }));
    }
  );
};
