/**
 * Board error taxonomy.
 * Returned inside Result values; none of these are thrown by the board itself.
 */

export type BoardErrorCode =
  // Board construction
  | "NoStartColumn"
  | "MultipleStartColumns"
  | "NoDoneColumn"
  | "MultipleDoneColumns"
  // Lookups
  | "CardNotFound"
  | "ColumnNotFound"
  // Call ordering
  | "CardAlreadyAdded"
  | "NoLastMove"
  // Policy
  | "WIPLimitExceeded"
  // Service layer
  | "DuplicateColumnId";

const DEFAULT_MESSAGES: Record<BoardErrorCode, string> = {
  NoStartColumn: "Board has no starting column",
  MultipleStartColumns: "Board has more than one starting column",
  NoDoneColumn: "Board has no done column",
  MultipleDoneColumns: "Board has more than one done column",
  CardNotFound: "Card is not in the iteration",
  ColumnNotFound: "Column is not on the board",
  CardAlreadyAdded: "Card is already in the iteration",
  NoLastMove: "There is no move to undo",
  WIPLimitExceeded: "Move would exceed the column's WIP limit",
  DuplicateColumnId: "Column id is used more than once",
};

export class BoardError extends Error {
  readonly code: BoardErrorCode;

  constructor(code: BoardErrorCode, message: string = DEFAULT_MESSAGES[code]) {
    super(message);
    this.name = "BoardError";
    this.code = code;
  }
}

/**
 * Narrow an unknown value to a BoardError, optionally of a given code.
 */
export function isBoardError(value: unknown, code?: BoardErrorCode): value is BoardError {
  return value instanceof BoardError && (code === undefined || value.code === code);
}
