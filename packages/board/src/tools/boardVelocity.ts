/**
 * board_velocity tool - Points completed in the iteration.
 */

import { successResponse } from "@agile-board/core";
import type { ToolRegistrar } from "./types.js";

export const registerBoardVelocity: ToolRegistrar = (server, service) => {
  server.registerTool(
    "board_velocity",
    {
      title: "Velocity",
      description: "Sum of the estimates of all cards in the done column.",
    },
    async () => {
      const velocity = service.velocity();
      return successResponse(`Velocity: ${velocity}`, { velocity });
    }
  );
};
