/**
 * board_undo tool - Revert the last move.
 */

import { resultToStructuredResponse } from "@agile-board/core";
import type { ToolRegistrar } from "./types.js";
import { toJson } from "./types.js";

export const registerBoardUndo: ToolRegistrar = (server, service) => {
  server.registerTool(
    "board_undo",
    {
      title: "Undo last move",
      description: "Send the most recently moved card back to its previous column. Only one move can be undone.",
    },
    async () => {
      const result = service.undoLastMove();
      return resultToStructuredResponse(result, (card) => ({
        text: toJson({ undone: true, card }),
        data: { card, velocity: service.velocity() },
      }));
    }
  );
};
