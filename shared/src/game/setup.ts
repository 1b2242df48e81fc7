import { BACK_RANK_ORDER, BOARD_SIZE, PAWN_HOME_ROW } from "./constants";
import { createEmptyBoard, placePiece } from "./board";
import type { Board } from "./board";
import type { PlayerColor } from "../types";

const BACK_ROW: Record<PlayerColor, number> = { white: BOARD_SIZE - 1, black: 0 };

const placeSide = (board: Board, color: PlayerColor): void => {
  BACK_RANK_ORDER.forEach((kind, col) => {
    placePiece(board, { row: BACK_ROW[color], col }, { kind, color });
    placePiece(board, { row: PAWN_HOME_ROW[color], col }, { kind: "pawn", color });
  });
};

export const createInitialBoard = (): Board => {
  const board = createEmptyBoard();
  placeSide(board, "black");
  placeSide(board, "white");
  return board;
};
