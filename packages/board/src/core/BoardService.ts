/**
 * Board service - id-addressed access to one board and its iteration.
 * The MCP tools talk to this; the domain objects stay identity-based underneath.
 */

import type { Result } from "@agile-board/core";
import { Ok, Err, andThen, map, unwrap } from "@agile-board/core";
import { Board } from "./Board.js";
import { BoardError } from "./errors.js";
import type { ColumnDefinition, ColumnType } from "./model.js";
import { Card, Column, DEFAULT_COLUMNS, generateCardId } from "./model.js";

/**
 * Card as seen through the service.
 */
export interface CardView {
  id: string;
  title: string;
  description: string;
  estimate: number;
  /** Column id */
  column: string;
}

export interface ColumnView {
  id: string;
  name: string;
  type: ColumnType;
  pointsLimit?: number;
  points: number;
  cardCount: number;
}

export interface BoardSummary {
  columns: ColumnView[];
  cardCount: number;
  velocity: number;
}

export interface CreateCardOptions {
  title: string;
  description?: string;
  estimate: number;
}

export class BoardService {
  private board: Board;
  private definitions: ColumnDefinition[];
  private columnIds = new Map<Column, string>();
  private columnsById = new Map<string, Column>();
  private cardsById = new Map<string, Card>();
  private cardIds = new Map<Card, string>();

  constructor(definitions: readonly ColumnDefinition[] = DEFAULT_COLUMNS) {
    this.definitions = [...definitions];
    this.board = unwrap(this.build(this.definitions));
  }

  /**
   * Replace the board with a new layout. All tracked cards are dropped.
   */
  setup(definitions: readonly ColumnDefinition[]): Result<BoardSummary, BoardError> {
    return map(this.build(definitions), (board) => {
      this.board = board;
      this.definitions = [...definitions];
      return this.getSummary();
    });
  }

  /**
   * Start over with the current layout.
   */
  reset(): BoardSummary {
    this.board = unwrap(this.build(this.definitions));
    return this.getSummary();
  }

  getColumns(): ColumnView[] {
    return this.board.columns.map((column) => this.toColumnView(column));
  }

  /**
   * Create a card and add it to the iteration's starting column.
   */
  createCard(options: CreateCardOptions): Result<CardView, BoardError> {
    const card = new Card(options);
    return andThen(this.board.iteration.add(card), () => {
      const id = generateCardId();
      this.cardsById.set(id, card);
      this.cardIds.set(card, id);
      return Ok(this.toCardView(card));
    });
  }

  getCard(id: string): Result<CardView, BoardError> {
    return map(this.findCard(id), (card) => this.toCardView(card));
  }

  moveCard(id: string, columnId: string): Result<CardView, BoardError> {
    return andThen(this.findCard(id), (card) =>
      andThen(this.findColumn(columnId), (column) =>
        map(this.board.iteration.move(card, column), () => this.toCardView(card))
      )
    );
  }

  /**
   * Undo the last move. Returns the card that was sent back.
   */
  undoLastMove(): Result<CardView, BoardError> {
    const move = this.board.iteration.lastMove;
    if (!move) {
      return Err(new BoardError("NoLastMove"));
    }
    return map(this.board.iteration.undoLastMove(), () => this.toCardView(move.card));
  }

  removeCard(id: string): Result<CardView, BoardError> {
    return andThen(this.findCard(id), (card) =>
      map(this.board.iteration.remove(card), () => {
        const view = this.toCardView(card);
        this.cardsById.delete(id);
        this.cardIds.delete(card);
        return view;
      })
    );
  }

  getCardsIn(columnId: string): Result<CardView[], BoardError> {
    return andThen(this.findColumn(columnId), (column) =>
      map(this.board.iteration.cardsIn(column), (cards) => cards.map((card) => this.toCardView(card)))
    );
  }

  velocity(): number {
    return this.board.iteration.velocity();
  }

  getSummary(): BoardSummary {
    return {
      columns: this.getColumns(),
      cardCount: this.board.iteration.cards.length,
      velocity: this.velocity(),
    };
  }

  /**
   * Build a board and swap in fresh id maps.
   * Nothing changes when validation fails.
   */
  private build(definitions: readonly ColumnDefinition[]): Result<Board, BoardError> {
    const seen = new Set<string>();
    for (const definition of definitions) {
      if (seen.has(definition.id)) {
        return Err(new BoardError("DuplicateColumnId", `Column id used more than once: ${definition.id}`));
      }
      seen.add(definition.id);
    }

    const columns = definitions.map((d) => new Column(d.name, d.type, d.pointsLimit));
    return map(Board.create(columns), (board) => {
      this.columnIds = new Map(columns.map((column, i) => [column, definitions[i].id]));
      this.columnsById = new Map(columns.map((column, i) => [definitions[i].id, column]));
      this.cardsById = new Map();
      this.cardIds = new Map();
      return board;
    });
  }

  private findCard(id: string): Result<Card, BoardError> {
    const card = this.cardsById.get(id);
    if (!card) {
      return Err(new BoardError("CardNotFound", `Card not found: ${id}`));
    }
    return Ok(card);
  }

  private findColumn(id: string): Result<Column, BoardError> {
    const column = this.columnsById.get(id);
    if (!column) {
      return Err(new BoardError("ColumnNotFound", `Column not found: ${id}`));
    }
    return Ok(column);
  }

  private toCardView(card: Card): CardView {
    return {
      id: this.cardIds.get(card) ?? "",
      title: card.title,
      description: card.description,
      estimate: card.estimate,
      column: card.column ? this.columnIds.get(card.column) ?? "" : "",
    };
  }

  private toColumnView(column: Column): ColumnView {
    const cards = unwrap(this.board.iteration.cardsIn(column));
    const view: ColumnView = {
      id: this.columnIds.get(column) ?? "",
      name: column.name,
      type: column.type,
      points: cards.reduce((total, card) => total + card.estimate, 0),
      cardCount: cards.length,
    };
    if (column.pointsLimit !== undefined) {
      view.pointsLimit = column.pointsLimit;
    }
    return view;
  }
}
