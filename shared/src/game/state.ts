import { hasPiece, isInsideBoard, pieceAt, placePiece } from "./board";
import { isValidMove } from "./pieces";
import { createInitialBoard } from "./setup";
import type { Board, Coord } from "./board";
import type { GameState, Piece, PlayerColor } from "../types";

interface ValidationError<E> {
  ok: false;
  error: E;
}

interface ValidationSuccess<T> {
  ok: true;
  value: T;
}

export type ValidationResult<T, E = string> = ValidationError<E> | ValidationSuccess<T>;

/** Why `attemptMove` refused a move, in the order the gates are checked. */
export type RejectionReason =
  | "out-of-range"
  | "no-piece-at-source"
  | "wrong-turn"
  | "friendly-fire-capture"
  | "illegal-geometry";

export interface AppliedMove {
  piece: Piece;
  from: Coord;
  to: Coord;
  captured: Piece | null;
}

export const createGame = (id: string): GameState => {
  const timestamp = Date.now();
  return {
    id,
    phase: "in-progress",
    createdAt: timestamp,
    updatedAt: timestamp,
    board: createInitialBoard(),
    whiteToMove: true,
    moveCount: 0
  };
};

export const sideToMove = (state: GameState): PlayerColor => (state.whiteToMove ? "white" : "black");

const checkGates = (state: GameState, from: Coord, to: Coord): ValidationResult<Piece, RejectionReason> => {
  if (!isInsideBoard(from) || !isInsideBoard(to)) {
    return { ok: false, error: "out-of-range" };
  }

  const piece = pieceAt(state.board, from);
  if (!piece) {
    return { ok: false, error: "no-piece-at-source" };
  }
  if (piece.color !== sideToMove(state)) {
    return { ok: false, error: "wrong-turn" };
  }

  const target = pieceAt(state.board, to);
  if (target && target.color === piece.color) {
    return { ok: false, error: "friendly-fire-capture" };
  }

  if (!isValidMove(piece, from, to, state.board)) {
    return { ok: false, error: "illegal-geometry" };
  }

  return { ok: true, value: piece };
};

/**
 * Validates and, when every gate passes, plays a move in place. A rejected
 * move leaves the state exactly as it was.
 */
export const attemptMove = (
  state: GameState,
  from: Coord,
  to: Coord
): ValidationResult<AppliedMove, RejectionReason> => {
  const validation = checkGates(state, from, to);
  if (!validation.ok) {
    return validation;
  }

  const piece = validation.value;
  const captured = pieceAt(state.board, to);
  placePiece(state.board, to, piece);
  placePiece(state.board, from, null);
  state.whiteToMove = !state.whiteToMove;
  state.moveCount += 1;
  evaluateGameCompletion(state);
  state.updatedAt = Date.now();

  return {
    ok: true,
    value: { piece, from: { ...from }, to: { ...to }, captured }
  };
};

/** The game ends as soon as either king has left the board. */
export const isGameOver = (board: Board): boolean =>
  !hasPiece(board, "king", "white") || !hasPiece(board, "king", "black");

const evaluateGameCompletion = (state: GameState): void => {
  if (!isGameOver(state.board)) {
    return;
  }
  state.phase = "completed";
  if (hasPiece(state.board, "king", "white")) {
    state.winner = "white";
  } else if (hasPiece(state.board, "king", "black")) {
    state.winner = "black";
  }
};
