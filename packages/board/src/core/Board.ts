/**
 * Board - a validated, fixed set of workflow columns and its iteration.
 */

import type { Result } from "@agile-board/core";
import { Ok, Err } from "@agile-board/core";
import type { Column } from "./model.js";
import { BoardError } from "./errors.js";
import { Iteration } from "./Iteration.js";

export class Board {
  readonly columns: readonly Column[];
  readonly startColumn: Column;
  readonly doneColumn: Column;
  /** The board's only iteration, bound for its whole life */
  readonly iteration: Iteration;

  private constructor(columns: readonly Column[], startColumn: Column, doneColumn: Column) {
    this.columns = Object.freeze([...columns]);
    this.startColumn = startColumn;
    this.doneColumn = doneColumn;
    // Created last so the iteration never sees a half-built board
    this.iteration = new Iteration(this);
  }

  /**
   * Validate the columns and build a board.
   * Start column problems are reported before done column problems.
   */
  static create(columns: readonly Column[]): Result<Board, BoardError> {
    const startColumns = columns.filter((c) => c.type === "starting");
    if (startColumns.length === 0) {
      return Err(new BoardError("NoStartColumn"));
    }
    if (startColumns.length > 1) {
      return Err(new BoardError("MultipleStartColumns"));
    }

    const doneColumns = columns.filter((c) => c.type === "done");
    if (doneColumns.length === 0) {
      return Err(new BoardError("NoDoneColumn"));
    }
    if (doneColumns.length > 1) {
      return Err(new BoardError("MultipleDoneColumns"));
    }

    return Ok(new Board(columns, startColumns[0], doneColumns[0]));
  }

  /**
   * Identity membership; a same-named column from elsewhere is not on this board.
   */
  hasColumn(column: Column): boolean {
    return this.columns.includes(column);
  }
}
