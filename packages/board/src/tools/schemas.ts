/**
 * Zod schemas shared by the board tools.
 */

import * as z from "zod/v4";

export const PointsSchema = z.number().int().nonnegative();

export const ColumnTypeSchema = z.enum(["starting", "normal", "done"]);

export const ColumnDefinitionSchema = z.object({
  id: z.string().min(1).describe("Column id (slug), used to address the column"),
  name: z.string().min(1).describe("Display name"),
  type: ColumnTypeSchema.describe("starting, normal or done"),
  pointsLimit: PointsSchema.optional().describe("WIP limit in points"),
});
