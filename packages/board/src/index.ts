/**
 * Agile board - cards moving through workflow columns in a single iteration.
 *
 * The domain (Board, Iteration, Column, Card) is identity-based and returns Results.
 * BoardService addresses the same board by string ids, and the MCP tools sit on top:
 * - board_setup: Replace the column layout
 * - board_columns: Columns with points and WIP limits
 * - board_add: Create a card in the starting column
 * - board_move: Move a card, enforcing WIP limits
 * - board_undo: Revert the last move
 * - board_remove: Remove a card
 * - board_cards: Cards in a column
 * - board_velocity: Points in the done column
 */

export { Board } from "./core/Board.js";
export { Iteration } from "./core/Iteration.js";
export { Card, Column, DEFAULT_COLUMNS } from "./core/model.js";
export type { ColumnType, CardOptions, ColumnDefinition, Move } from "./core/model.js";
export { BoardError, isBoardError } from "./core/errors.js";
export type { BoardErrorCode } from "./core/errors.js";
export { BoardService } from "./core/BoardService.js";
export type {
  CardView,
  ColumnView,
  BoardSummary,
  CreateCardOptions,
} from "./core/BoardService.js";
export { registerBoardTools } from "./tools/registerTools.js";
