import { PAWN_DIRECTION, PAWN_HOME_ROW } from "./constants";
import { pieceAt } from "./board";
import { isPathClear } from "./path";
import type { Board, Coord } from "./board";
import type { Piece, PlayerColor } from "../types";

interface Delta {
  row: number;
  col: number;
}

const deltaOf = (from: Coord, to: Coord): Delta => ({
  row: to.row - from.row,
  col: to.col - from.col
});

const isDiagonal = ({ row, col }: Delta): boolean => row !== 0 && Math.abs(row) === Math.abs(col);

const isStraight = ({ row, col }: Delta): boolean => (row === 0) !== (col === 0);

const isPawnMoveValid = (color: PlayerColor, from: Coord, to: Coord, board: Board): boolean => {
  const direction = PAWN_DIRECTION[color];
  const delta = deltaOf(from, to);
  const target = pieceAt(board, to);

  if (delta.col === 0) {
    if (delta.row === direction) {
      return target === null;
    }
    if (delta.row === 2 * direction && from.row === PAWN_HOME_ROW[color]) {
      const between = { row: from.row + direction, col: from.col };
      return target === null && pieceAt(board, between) === null;
    }
    return false;
  }

  // Diagonal steps only ever capture.
  if (Math.abs(delta.col) === 1 && delta.row === direction) {
    return target !== null && target.color !== color;
  }

  return false;
};

/**
 * Geometry and occupancy rules for a single piece moving from `from` to `to`.
 * Turn order and friendly destinations are checked by the caller; this only
 * answers whether the piece itself can make the trip.
 */
export const isValidMove = (piece: Piece, from: Coord, to: Coord, board: Board): boolean => {
  const delta = deltaOf(from, to);

  switch (piece.kind) {
    case "pawn":
      return isPawnMoveValid(piece.color, from, to, board);
    case "knight": {
      const rows = Math.abs(delta.row);
      const cols = Math.abs(delta.col);
      return (rows === 1 && cols === 2) || (rows === 2 && cols === 1);
    }
    case "bishop":
      return isDiagonal(delta) && isPathClear(from, to, board);
    case "rook":
      return isStraight(delta) && isPathClear(from, to, board);
    case "queen":
      return (isDiagonal(delta) || isStraight(delta)) && isPathClear(from, to, board);
    case "king": {
      const rows = Math.abs(delta.row);
      const cols = Math.abs(delta.col);
      return rows <= 1 && cols <= 1 && (rows !== 0 || cols !== 0);
    }
    default: {
      const unreachable: never = piece.kind;
      return unreachable;
    }
  }
};
