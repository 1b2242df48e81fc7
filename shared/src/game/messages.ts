import { pieceAt } from "./board";
import { formatSquare } from "./notation";
import { colorName, pieceSymbol } from "./render";
import { sideToMove } from "./state";
import type { Coord } from "./board";
import type { RejectionReason } from "./state";
import type { GameState } from "../types";

export const INVALID_NOTATION_MESSAGE = "Invalid notation. Please use algebraic notation (e.g., e2 to e4).";

export const INVALID_FORMAT_MESSAGE = "Invalid input format. Use 'from to' (e.g., e2 e4).";

/** Player-facing text for a rejected move. Reads the state as it was when the move was refused. */
export const describeRejection = (state: GameState, reason: RejectionReason, from: Coord): string => {
  switch (reason) {
    case "out-of-range":
      return "Invalid coordinates.";
    case "no-piece-at-source":
      return `No piece at position ${formatSquare(from)}.`;
    case "wrong-turn":
      return `It's ${colorName(sideToMove(state))}'s turn.`;
    case "friendly-fire-capture":
      return "Cannot capture your own piece.";
    case "illegal-geometry": {
      const piece = pieceAt(state.board, from);
      return piece ? `Invalid move for ${pieceSymbol(piece)}.` : "Invalid move.";
    }
    default: {
      const unreachable: never = reason;
      return unreachable;
    }
  }
};
