import { describe, it, expect, beforeEach } from "vitest";
import { unwrap } from "@agile-board/core";
import { Board } from "../src/core/Board.js";
import { Card, Column } from "../src/core/model.js";
import type { Iteration } from "../src/core/Iteration.js";

function card(title: string, estimate: number): Card {
  return new Card({ title, description: "this is a card", estimate });
}

describe("Iteration", () => {
  let start: Column;
  let doing: Column;
  let done: Column;
  let iteration: Iteration;

  beforeEach(() => {
    start = new Column("Starting", "starting");
    doing = new Column("Doing", "normal");
    done = new Column("Done", "done");
    iteration = unwrap(Board.create([start, doing, done])).iteration;
  });

  describe("add", () => {
    it("places the card in the starting column", () => {
      const a = card("A", 5);
      expect(a.column).toBeUndefined();

      expect(iteration.add(a).ok).toBe(true);
      expect(a.column).toBe(start);
      expect(iteration.cards).toEqual([a]);
    });

    it("rejects a card that is already tracked", () => {
      const a = card("A", 5);
      iteration.add(a);

      const result = iteration.add(a);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe("CardAlreadyAdded");
      }
      expect(iteration.cards).toHaveLength(1);
    });

    it("treats field-identical cards as different cards", () => {
      const a = card("Same", 3);
      const b = card("Same", 3);
      expect(iteration.add(a).ok).toBe(true);
      expect(iteration.add(b).ok).toBe(true);
      expect(iteration.cards).toHaveLength(2);
    });

    it("ignores the starting column's WIP limit", () => {
      const limited = new Column("Starting", "starting", 10);
      const limitedIteration = unwrap(Board.create([limited, new Column("Done", "done")])).iteration;

      expect(limitedIteration.add(card("A", 5)).ok).toBe(true);
      expect(limitedIteration.add(card("B", 5)).ok).toBe(true);
      expect(limitedIteration.add(card("C", 5)).ok).toBe(true);
      expect(unwrap(limitedIteration.pointsIn(limited))).toBe(15);
    });

    it("does not change velocity", () => {
      iteration.add(card("A", 5));
      expect(iteration.velocity()).toBe(0);
    });
  });

  describe("card placement", () => {
    it("cannot be changed from outside the iteration", () => {
      const a = card("A", 5);
      iteration.add(a);

      expect(Reflect.set(a, "column", done)).toBe(false);
      expect(a.column).toBe(start);
      expect(iteration.velocity()).toBe(0);
    });

    it("is not part of the package exports", async () => {
      const api = await import("../src/index.js");
      expect(Object.keys(api)).not.toContain("placeCard");
    });
  });

  describe("remove", () => {
    it("stops tracking the card and leaves its column reference", () => {
      const a = card("A", 5);
      iteration.add(a);
      iteration.move(a, done);

      expect(iteration.remove(a).ok).toBe(true);
      expect(iteration.cards).toEqual([]);
      expect(a.column).toBe(done);
      expect(iteration.velocity()).toBe(0);
    });

    it("fails for an unknown card", () => {
      const result = iteration.remove(card("A", 5));
      expect(!result.ok && result.error.code).toBe("CardNotFound");
    });
  });

  describe("move", () => {
    it("moves a tracked card to a board column", () => {
      const a = card("A", 5);
      iteration.add(a);

      expect(iteration.move(a, doing).ok).toBe(true);
      expect(a.column).toBe(doing);
    });

    it("fails for a card that was never added", () => {
      const a = card("A", 5);
      const result = iteration.move(a, done);
      expect(!result.ok && result.error.code).toBe("CardNotFound");
      expect(a.column).toBeUndefined();
    });

    it("fails for a column that is not on the board", () => {
      const a = card("A", 5);
      iteration.add(a);

      const result = iteration.move(a, new Column("missing", "normal"));
      expect(!result.ok && result.error.code).toBe("ColumnNotFound");
      expect(a.column).toBe(start);
    });

    it("allows any-to-any moves", () => {
      const a = card("A", 5);
      iteration.add(a);

      expect(iteration.move(a, done).ok).toBe(true);
      expect(iteration.move(a, start).ok).toBe(true);
      expect(iteration.move(a, doing).ok).toBe(true);
      expect(a.column).toBe(doing);
    });

    it("records the move for undo", () => {
      const a = card("A", 5);
      iteration.add(a);
      iteration.move(a, doing);

      expect(iteration.lastMove).toEqual({ card: a, from: start, to: doing });
    });

    it("does not record a failed move", () => {
      const a = card("A", 5);
      iteration.add(a);
      iteration.move(a, new Column("missing", "normal"));

      expect(iteration.lastMove).toBeUndefined();
    });
  });

  describe("WIP limits", () => {
    let limited: Column;
    let limitedIteration: Iteration;

    beforeEach(() => {
      limited = new Column("Doing", "normal", 10);
      limitedIteration = unwrap(Board.create([start, limited, done])).iteration;
    });

    it("allows moves up to the limit", () => {
      const a = card("A", 5);
      const b = card("B", 5);
      limitedIteration.add(a);
      limitedIteration.add(b);

      expect(limitedIteration.move(a, limited).ok).toBe(true);
      expect(limitedIteration.move(b, limited).ok).toBe(true);
      expect(unwrap(limitedIteration.pointsIn(limited))).toBe(10);
    });

    it("rejects a move that would go over the limit", () => {
      const a = card("A", 6);
      const b = card("B", 5);
      limitedIteration.add(a);
      limitedIteration.add(b);
      limitedIteration.move(a, limited);

      const result = limitedIteration.move(b, limited);
      expect(!result.ok && result.error.code).toBe("WIPLimitExceeded");
      expect(b.column).toBe(start);
      expect(limitedIteration.lastMove?.card).toBe(a);
    });

    it("rejects a single card larger than the limit", () => {
      const big = card("Big", 11);
      limitedIteration.add(big);
      const result = limitedIteration.move(big, limited);
      expect(!result.ok && result.error.code).toBe("WIPLimitExceeded");
    });

    it("blocks every card from a zero-limit column except zero-point cards", () => {
      const zero = new Column("Frozen", "normal", 0);
      const frozen = unwrap(Board.create([start, zero, done])).iteration;
      const spike = card("Spike", 0);
      const story = card("Story", 1);
      frozen.add(spike);
      frozen.add(story);

      expect(frozen.move(spike, zero).ok).toBe(true);
      const result = frozen.move(story, zero);
      expect(!result.ok && result.error.code).toBe("WIPLimitExceeded");
    });

    it("never blocks moving out of a full column", () => {
      const a = card("A", 10);
      limitedIteration.add(a);
      limitedIteration.move(a, limited);

      expect(limitedIteration.move(a, done).ok).toBe(true);
      expect(unwrap(limitedIteration.pointsIn(limited))).toBe(0);
    });

    it("counts a card already in the column against its own move", () => {
      const a = card("A", 6);
      limitedIteration.add(a);
      limitedIteration.move(a, limited);

      const result = limitedIteration.move(a, limited);
      expect(!result.ok && result.error.code).toBe("WIPLimitExceeded");
    });

    it("rejects a full starting column even for an untracked card", () => {
      const startLimited = new Column("Starting", "starting", 10);
      const board = unwrap(Board.create([startLimited, new Column("Done", "done")]));
      board.iteration.add(card("A", 5));
      board.iteration.add(card("B", 5));

      const result = board.iteration.move(card("C", 5), startLimited);
      expect(!result.ok && result.error.code).toBe("WIPLimitExceeded");
    });

    it("rejects a full starting column for a tracked card", () => {
      const startLimited = new Column("Starting", "starting", 10);
      const board = unwrap(Board.create([startLimited, new Column("Done", "done")]));
      const c = card("C", 5);
      board.iteration.add(card("A", 5));
      board.iteration.add(card("B", 5));
      board.iteration.add(c);

      const result = board.iteration.move(c, startLimited);
      expect(!result.ok && result.error.code).toBe("WIPLimitExceeded");
    });

    it("reports a foreign limited column as not found", () => {
      const a = card("A", 1);
      limitedIteration.add(a);
      const result = limitedIteration.move(a, new Column("Doing", "normal", 10));
      expect(!result.ok && result.error.code).toBe("ColumnNotFound");
    });

    it("checks the limit before membership", () => {
      const a = card("A", 10);
      limitedIteration.add(a);
      limitedIteration.move(a, limited);

      const result = limitedIteration.move(card("Stranger", 1), limited);
      expect(!result.ok && result.error.code).toBe("WIPLimitExceeded");
    });
  });

  describe("undoLastMove", () => {
    it("fails when nothing has moved", () => {
      iteration.add(card("A", 5));
      const result = iteration.undoLastMove();
      expect(!result.ok && result.error.code).toBe("NoLastMove");
    });

    it("sends the card back to where it was", () => {
      const a = card("A", 5);
      iteration.add(a);
      iteration.move(a, doing);
      iteration.move(a, done);

      expect(iteration.undoLastMove().ok).toBe(true);
      expect(a.column).toBe(doing);
    });

    it("only undoes a single move", () => {
      const a = card("A", 5);
      iteration.add(a);
      iteration.move(a, doing);
      iteration.move(a, done);

      expect(iteration.undoLastMove().ok).toBe(true);
      const second = iteration.undoLastMove();
      expect(!second.ok && second.error.code).toBe("NoLastMove");
      expect(a.column).toBe(doing);
    });

    it("undoes the most recent move across cards", () => {
      const a = card("A", 5);
      const b = card("B", 3);
      iteration.add(a);
      iteration.add(b);
      iteration.move(a, done);
      iteration.move(b, doing);

      iteration.undoLastMove();
      expect(a.column).toBe(done);
      expect(b.column).toBe(start);
    });

    it("ignores WIP limits when restoring", () => {
      const startLimited = new Column("Starting", "starting", 5);
      const board = unwrap(Board.create([startLimited, done]));
      const a = card("A", 5);
      const b = card("B", 5);
      board.iteration.add(a);
      board.iteration.move(a, done);
      // adding is never limited, so the starting column fills up again
      board.iteration.add(b);

      expect(board.iteration.undoLastMove().ok).toBe(true);
      expect(a.column).toBe(startLimited);
      expect(unwrap(board.iteration.pointsIn(startLimited))).toBe(10);
    });

    it("fails for a card removed after its move and keeps the record", () => {
      const a = card("A", 5);
      iteration.add(a);
      iteration.move(a, done);
      iteration.remove(a);

      const result = iteration.undoLastMove();
      expect(!result.ok && result.error.code).toBe("CardNotFound");
      expect(iteration.lastMove?.card).toBe(a);
    });
  });

  describe("cardsIn", () => {
    it("returns the cards in a column in insertion order", () => {
      const a = card("A", 1);
      const b = card("B", 2);
      const c = card("C", 3);
      iteration.add(a);
      iteration.add(b);
      iteration.add(c);
      iteration.move(c, done);
      iteration.move(a, done);

      expect(unwrap(iteration.cardsIn(done))).toEqual([a, c]);
      expect(unwrap(iteration.cardsIn(start))).toEqual([b]);
      expect(unwrap(iteration.cardsIn(doing))).toEqual([]);
    });

    it("excludes removed cards", () => {
      const a = card("A", 1);
      iteration.add(a);
      iteration.remove(a);
      expect(unwrap(iteration.cardsIn(start))).toEqual([]);
    });

    it("fails for a column that is not on the board", () => {
      const result = iteration.cardsIn(new Column("Done", "done"));
      expect(!result.ok && result.error.code).toBe("ColumnNotFound");
    });
  });

  describe("velocity", () => {
    it("is zero for an empty iteration", () => {
      expect(iteration.velocity()).toBe(0);
    });

    it("sums the estimates in the done column", () => {
      const a = card("A", 5);
      const b = card("B", 42);
      const c = card("C", 8);
      iteration.add(a);
      iteration.add(b);
      iteration.add(c);
      iteration.move(a, done);
      iteration.move(b, done);
      iteration.move(c, doing);

      expect(iteration.velocity()).toBe(47);
      expect(unwrap(iteration.cardsIn(start))).toHaveLength(0);
      expect(unwrap(iteration.cardsIn(done))).toHaveLength(2);
    });

    it("reverts when the move to done is undone", () => {
      const a = card("A", 5);
      iteration.add(a);
      expect(iteration.velocity()).toBe(0);

      iteration.move(a, done);
      expect(iteration.velocity()).toBe(5);
      expect(a.column).toBe(done);

      expect(iteration.undoLastMove().ok).toBe(true);
      expect(iteration.velocity()).toBe(0);
      expect(a.column).toBe(start);
    });
  });
});
