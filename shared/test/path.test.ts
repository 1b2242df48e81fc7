import { describe, expect, it } from "vitest";
import { createEmptyBoard, isPathClear, placePiece } from "@rankfile/shared";
import { black, sq, white } from "./helpers";

const FILE_TARGETS = ["a2", "a3", "a4", "a5", "a6", "a7", "a8"];
const DIAGONAL_TARGETS = ["b2", "c3", "d4", "e5", "f6", "g7", "h8"];

describe("path clearance", () => {
  it("is clear along an empty file for every corridor length", () => {
    const board = createEmptyBoard();
    FILE_TARGETS.forEach((target) => {
      expect(isPathClear(sq("a1"), sq(target), board)).toBe(true);
    });
  });

  it("is clear along an empty diagonal in both directions", () => {
    const board = createEmptyBoard();
    DIAGONAL_TARGETS.forEach((target) => {
      expect(isPathClear(sq("a1"), sq(target), board)).toBe(true);
      expect(isPathClear(sq(target), sq("a1"), board)).toBe(true);
    });
  });

  it("is blocked by a single piece on any intermediate square", () => {
    const between = ["b2", "c3", "d4", "e5", "f6", "g7"];
    between.forEach((label) => {
      const board = createEmptyBoard();
      placePiece(board, sq(label), black("pawn"));
      expect(isPathClear(sq("a1"), sq("h8"), board)).toBe(false);
    });
  });

  it("is blocked along a rank", () => {
    const board = createEmptyBoard();
    placePiece(board, sq("e4"), white("knight"));
    expect(isPathClear(sq("h4"), sq("a4"), board)).toBe(false);
    expect(isPathClear(sq("h4"), sq("f4"), board)).toBe(true);
  });

  it("ignores pieces standing on the endpoints", () => {
    const board = createEmptyBoard();
    placePiece(board, sq("c1"), white("rook"));
    placePiece(board, sq("c8"), black("rook"));
    expect(isPathClear(sq("c1"), sq("c8"), board)).toBe(true);
  });
});
