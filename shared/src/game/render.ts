import { BOARD_SIZE, FILE_LETTERS } from "./constants";
import { pieceAt } from "./board";
import { sideToMove } from "./state";
import type { Piece, GameState, PieceKind } from "../types";

const SYMBOLS: Record<PieceKind, string> = {
  pawn: "P",
  knight: "N",
  bishop: "B",
  rook: "R",
  queen: "Q",
  king: "K"
};

const FILES_LINE = `   ${FILE_LETTERS.join(" ")}`;
const BORDER_LINE = "  +-----------------+";

/** Uppercase for white, lowercase for black. */
export const pieceSymbol = (piece: Piece): string =>
  piece.color === "white" ? SYMBOLS[piece.kind] : SYMBOLS[piece.kind].toLowerCase();

export const colorName = (color: Piece["color"]): string => (color === "white" ? "White" : "Black");

const renderRow = (state: GameState, row: number): string => {
  const rank = BOARD_SIZE - row;
  let cells = "";
  for (let col = 0; col < BOARD_SIZE; col += 1) {
    const piece = pieceAt(state.board, { row, col });
    if (piece) {
      cells += pieceSymbol(piece);
    } else {
      cells += (row + col) % 2 === 0 ? "." : " ";
    }
    cells += " ";
  }
  return `${rank} |${cells}| ${rank}`;
};

export const renderBoard = (state: GameState): string => {
  const lines = [FILES_LINE, BORDER_LINE];
  for (let row = 0; row < BOARD_SIZE; row += 1) {
    lines.push(renderRow(state, row));
  }
  lines.push(BORDER_LINE, FILES_LINE, "", `${colorName(sideToMove(state))} to move`);
  return lines.join("\n");
};
