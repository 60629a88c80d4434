/**
 * board_add tool - Create a card in the starting column.
 */

import * as z from "zod/v4";
import { resultToStructuredResponse } from "@agile-board/core";
import type { ToolRegistrar } from "./types.js";
import { toJson } from "./types.js";
import { PointsSchema } from "./schemas.js";

export const registerBoardAdd: ToolRegistrar = (server, service) => {
  server.registerTool(
    "board_add",
    {
      title: "Add card",
      description: "Create a card and place it in the starting column. WIP limits are not checked on add.",
      inputSchema: {
        title: z.string().min(1).describe("Card title"),
        description: z.string().optional().describe("Card description"),
        estimate: PointsSchema.describe("Estimate in points"),
      },
    },
    async (input) => {
      const result = service.createCard(input);
      return resultToStructuredResponse(result, (card) => ({
        text: toJson(card),
        data: { card },
      }));
    }
  );
};
