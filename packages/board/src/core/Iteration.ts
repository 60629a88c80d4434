/**
 * Iteration - the cards tracked on a board and their placement.
 *
 * Not safe for concurrent use: callers on threads or workers must serialize access.
 * Every operation validates fully before it mutates anything.
 */

import type { Result } from "@agile-board/core";
import { Ok, Err, andThen } from "@agile-board/core";
import type { Board } from "./Board.js";
import type { Card, Column, Move } from "./model.js";
import { placeCard } from "./model.js";
import { BoardError } from "./errors.js";

export class Iteration {
  readonly board: Board;
  private readonly members: Card[] = [];
  private recordedMove: Move | undefined;

  constructor(board: Board) {
    this.board = board;
  }

  /**
   * Tracked cards in the order they were added.
   */
  get cards(): readonly Card[] {
    return this.members;
  }

  /**
   * The move undoLastMove would revert, if any.
   */
  get lastMove(): Readonly<Move> | undefined {
    return this.recordedMove;
  }

  /**
   * Track a card and place it in the starting column.
   * The starting column's WIP limit is not applied here.
   */
  add(card: Card): Result<void, BoardError> {
    if (this.contains(card)) {
      return Err(new BoardError("CardAlreadyAdded", `Card "${card.title}" is already in the iteration`));
    }

    this.members.push(card);
    placeCard(card, this.board.startColumn);
    return Ok(undefined);
  }

  /**
   * Stop tracking a card. Its column reference is left as it was.
   */
  remove(card: Card): Result<void, BoardError> {
    const index = this.members.indexOf(card);
    if (index === -1) {
      return Err(cardNotFound(card));
    }

    this.members.splice(index, 1);
    return Ok(undefined);
  }

  /**
   * Move a card to another column on the board, enforcing the destination's WIP limit.
   */
  move(card: Card, to: Column): Result<void, BoardError> {
    if (to.pointsLimit !== undefined) {
      const points = this.pointsIn(to);
      if (!points.ok) {
        return points;
      }
      if (points.value + card.estimate > to.pointsLimit) {
        return Err(
          new BoardError(
            "WIPLimitExceeded",
            `Moving "${card.title}" (${card.estimate}) to "${to.name}" would make ${points.value + card.estimate} points, limit is ${to.pointsLimit}`
          )
        );
      }
    }

    return andThen(this.checkPlacement(card, to), (from) => {
      this.recordedMove = { card, from, to };
      placeCard(card, to);
      return Ok(undefined);
    });
  }

  /**
   * Send the most recently moved card back to the column it came from.
   * WIP limits are not applied. The move is consumed, so undo does not repeat.
   */
  undoLastMove(): Result<void, BoardError> {
    const move = this.recordedMove;
    if (!move) {
      return Err(new BoardError("NoLastMove"));
    }

    return andThen(this.checkPlacement(move.card, move.from), () => {
      placeCard(move.card, move.from);
      this.recordedMove = undefined;
      return Ok(undefined);
    });
  }

  /**
   * Cards currently in a column, in the order they were added.
   */
  cardsIn(column: Column): Result<Card[], BoardError> {
    if (!this.board.hasColumn(column)) {
      return Err(columnNotFound(column));
    }
    return Ok(this.members.filter((c) => c.column === column));
  }

  /**
   * Total estimate of the cards in a column.
   */
  pointsIn(column: Column): Result<number, BoardError> {
    return andThen(this.cardsIn(column), (cards) => Ok(sumEstimates(cards)));
  }

  /**
   * Total estimate of the cards in the done column.
   */
  velocity(): number {
    return sumEstimates(this.members.filter((c) => c.column?.type === "done"));
  }

  private contains(card: Card): boolean {
    return this.members.includes(card);
  }

  /**
   * Membership and column checks shared by move and undo.
   * Yields the card's current column.
   */
  private checkPlacement(card: Card, to: Column): Result<Column, BoardError> {
    if (!this.contains(card) || !card.column) {
      return Err(cardNotFound(card));
    }
    if (!this.board.hasColumn(to)) {
      return Err(columnNotFound(to));
    }
    return Ok(card.column);
  }
}

function sumEstimates(cards: readonly Card[]): number {
  return cards.reduce((total, card) => total + card.estimate, 0);
}

function cardNotFound(card: Card): BoardError {
  return new BoardError("CardNotFound", `Card "${card.title}" is not in the iteration`);
}

function columnNotFound(column: Column): BoardError {
  return new BoardError("ColumnNotFound", `Column "${column.name}" is not on the board`);
}
