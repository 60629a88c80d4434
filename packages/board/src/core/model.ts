/**
 * Board model types.
 * Cards and columns are compared by identity: two field-identical cards are still two cards.
 */

/**
 * Role of a column in the workflow.
 */
export type ColumnType = "starting" | "normal" | "done";

function assertPoints(value: number, what: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${what} must be a non-negative integer, got ${value}`);
  }
}

/**
 * A workflow stage.
 */
export class Column {
  /** Display name; columns may share names */
  name: string;
  readonly type: ColumnType;
  /** Maximum total estimate allowed in the column */
  readonly pointsLimit?: number;

  constructor(name: string, type: ColumnType, pointsLimit?: number) {
    if (pointsLimit !== undefined) {
      assertPoints(pointsLimit, "pointsLimit");
    }
    this.name = name;
    this.type = type;
    this.pointsLimit = pointsLimit;
  }
}

export interface CardOptions {
  title: string;
  description?: string;
  estimate: number;
}

/**
 * A unit of work.
 */
export class Card {
  title: string;
  description: string;
  readonly estimate: number;

  constructor(options: CardOptions) {
    assertPoints(options.estimate, "estimate");
    this.title = options.title;
    this.description = options.description ?? "";
    this.estimate = options.estimate;
  }

  /**
   * Current column; undefined until the card is added to an iteration.
   */
  get column(): Column | undefined {
    return placements.get(this);
  }
}

const placements = new WeakMap<Card, Column>();

/**
 * Set a card's column. Only Iteration calls this; it is not exported from the package.
 */
export function placeCard(card: Card, column: Column): void {
  placements.set(card, column);
}

/**
 * A recorded card transition, kept for undo.
 */
export interface Move {
  card: Card;
  from: Column;
  to: Column;
}

/**
 * Column description used by the service layer, addressed by a slug id.
 */
export interface ColumnDefinition {
  id: string;
  name: string;
  type: ColumnType;
  pointsLimit?: number;
}

/**
 * Layout for a new board.
 */
export const DEFAULT_COLUMNS: readonly ColumnDefinition[] = [
  { id: "backlog", name: "Backlog", type: "starting" },
  { id: "todo", name: "To Do", type: "normal" },
  { id: "in_progress", name: "In Progress", type: "normal", pointsLimit: 8 },
  { id: "done", name: "Done", type: "done" },
];

/**
 * Generate a unique card ID.
 */
export function generateCardId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `${timestamp}-${random}`;
}
