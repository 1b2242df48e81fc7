import { describe, expect, it } from "vitest";
import { applyMoveCommand, createGame, describeRejection, pieceAt } from "@rankfile/shared";
import { black, buildActiveState, sq, white } from "./helpers";

describe("applyMoveCommand", () => {
  it("plays a move from algebraic labels", () => {
    const state = createGame("standard");
    const result = applyMoveCommand(state, "white", { from: "g1", to: "f3" });
    expect(result.ok).toBe(true);
    expect(pieceAt(state.board, sq("f3"))).toStrictEqual(white("knight"));
    expect(state.whiteToMove).toBe(false);
  });

  it("refuses a player moving out of turn", () => {
    const state = createGame("standard");
    const result = applyMoveCommand(state, "black", { from: "e7", to: "e5" });
    expect(result).toStrictEqual({
      ok: false,
      error: { reason: "not-your-seat", message: "Not your turn" }
    });
  });

  it("refuses unknown square labels", () => {
    const state = createGame("standard");
    const result = applyMoveCommand(state, "white", { from: "e2", to: "e9" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe("notation");
  });

  it("explains board rejections", () => {
    const state = createGame("standard");
    expect(applyMoveCommand(state, "white", { from: "e2", to: "e5" })).toStrictEqual({
      ok: false,
      error: { reason: "illegal-geometry", message: "Invalid move for P." }
    });
    expect(applyMoveCommand(state, "white", { from: "e3", to: "e4" })).toStrictEqual({
      ok: false,
      error: { reason: "no-piece-at-source", message: "No piece at position e3." }
    });
    expect(applyMoveCommand(state, "white", { from: "d7", to: "d5" })).toStrictEqual({
      ok: false,
      error: { reason: "wrong-turn", message: "It's White's turn." }
    });
    expect(applyMoveCommand(state, "white", { from: "d1", to: "d2" })).toStrictEqual({
      ok: false,
      error: { reason: "friendly-fire-capture", message: "Cannot capture your own piece." }
    });
  });

  it("refuses moves once a king has fallen", () => {
    const state = buildActiveState({ e7: white("rook"), a7: black("pawn") });
    expect(applyMoveCommand(state, "white", { from: "e7", to: "e8" }).ok).toBe(true);
    expect(applyMoveCommand(state, "black", { from: "a7", to: "a6" })).toStrictEqual({
      ok: false,
      error: { reason: "game-completed", message: "Game already completed" }
    });
  });
});

describe("describeRejection", () => {
  it("names black when it is black's turn", () => {
    const state = buildActiveState({ c2: white("pawn") }, "black");
    expect(describeRejection(state, "wrong-turn", sq("c2"))).toBe("It's Black's turn.");
  });

  it("uses the lowercase symbol for black pieces", () => {
    const state = buildActiveState({ b8: black("knight") }, "black");
    expect(describeRejection(state, "illegal-geometry", sq("b8"))).toBe("Invalid move for n.");
  });

  it("does not need a valid square for range errors", () => {
    const state = createGame("standard");
    expect(describeRejection(state, "out-of-range", { row: 9, col: 9 })).toBe("Invalid coordinates.");
  });
});
