import { pieceAt } from "./board";
import type { Board, Coord } from "./board";

/**
 * True when every square strictly between `from` and `to` is empty.
 * The two squares must share a row, a column or a diagonal; the endpoints
 * themselves are never inspected.
 */
export const isPathClear = (from: Coord, to: Coord, board: Board): boolean => {
  const stepRow = Math.sign(to.row - from.row);
  const stepCol = Math.sign(to.col - from.col);

  let row = from.row + stepRow;
  let col = from.col + stepCol;

  while (row !== to.row || col !== to.col) {
    if (pieceAt(board, { row, col })) {
      return false;
    }
    row += stepRow;
    col += stepCol;
  }

  return true;
};
