import { createEmptyBoard, createGame, parseSquare, placePiece } from "@rankfile/shared";
import type { Board, Coord, GameState, Piece, PieceKind, PlayerColor } from "@rankfile/shared";

export const sq = (label: string): Coord => {
  const coord = parseSquare(label);
  if (!coord) {
    throw new Error(`Bad square label in test: ${label}`);
  }
  return coord;
};

export const white = (kind: PieceKind): Piece => ({ kind, color: "white" });
export const black = (kind: PieceKind): Piece => ({ kind, color: "black" });

export const boardWith = (placements: Record<string, Piece>): Board => {
  const board = createEmptyBoard();
  Object.entries(placements).forEach(([label, piece]) => placePiece(board, sq(label), piece));
  return board;
};

/** A running game on a custom board; both kings are added unless the placements move them. */
export const buildActiveState = (
  placements: Record<string, Piece>,
  turn: PlayerColor = "white",
  withKings = true
): GameState => {
  const state = createGame("scenario");
  const kings: Record<string, Piece> = withKings ? { e1: white("king"), e8: black("king") } : {};
  state.board = boardWith({ ...kings, ...placements });
  state.whiteToMove = turn === "white";
  return state;
};
