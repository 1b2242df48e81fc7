import { BOARD_SIZE } from "./constants";
import type { Piece, PieceKind, PlayerColor } from "../types";

/** `col` is the file (0 = a), `row` counts down from the top (0 = rank 8). */
export interface Coord {
  row: number;
  col: number;
}

export type Square = Piece | null;

/** Indexed `board[row][col]`. */
export type Board = Square[][];

export interface BoardSquare {
  coord: Coord;
  piece: Square;
}

export const isInsideBoard = (coord: Coord): boolean =>
  Number.isInteger(coord.row) &&
  Number.isInteger(coord.col) &&
  coord.row >= 0 &&
  coord.row < BOARD_SIZE &&
  coord.col >= 0 &&
  coord.col < BOARD_SIZE;

export const createEmptyBoard = (): Board =>
  Array.from({ length: BOARD_SIZE }, () => Array.from({ length: BOARD_SIZE }, (): Square => null));

export const pieceAt = (board: Board, coord: Coord): Square => board[coord.row]?.[coord.col] ?? null;

export const placePiece = (board: Board, coord: Coord, piece: Square): void => {
  board[coord.row][coord.col] = piece;
};

/** Every square in row-major order, starting from a8. */
export const boardSquares = (board: Board): BoardSquare[] => {
  const squares: BoardSquare[] = [];
  for (let row = 0; row < BOARD_SIZE; row += 1) {
    for (let col = 0; col < BOARD_SIZE; col += 1) {
      squares.push({ coord: { row, col }, piece: pieceAt(board, { row, col }) });
    }
  }
  return squares;
};

export const countPieces = (board: Board): number =>
  boardSquares(board).filter((square) => square.piece !== null).length;

export const hasPiece = (board: Board, kind: PieceKind, color: PlayerColor): boolean =>
  boardSquares(board).some((square) => square.piece?.kind === kind && square.piece.color === color);
