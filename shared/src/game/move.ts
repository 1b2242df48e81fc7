import { describeRejection, INVALID_NOTATION_MESSAGE } from "./messages";
import { parseSquare } from "./notation";
import { attemptMove, sideToMove } from "./state";
import type { AppliedMove, RejectionReason, ValidationResult } from "./state";
import type { GameState, MoveCommand, PlayerColor } from "../types";

export type CommandRejectionReason = RejectionReason | "game-completed" | "not-your-seat" | "notation";

export interface MoveRejection {
  reason: CommandRejectionReason;
  message: string;
}

/**
 * Entry point for a seated player: checks the game is still running and that
 * `player` owns the side to move, then runs the board's own gates.
 */
export const applyMoveCommand = (
  state: GameState,
  player: PlayerColor,
  command: MoveCommand
): ValidationResult<AppliedMove, MoveRejection> => {
  if (state.phase === "completed") {
    return { ok: false, error: { reason: "game-completed", message: "Game already completed" } };
  }
  if (sideToMove(state) !== player) {
    return { ok: false, error: { reason: "not-your-seat", message: "Not your turn" } };
  }

  const from = parseSquare(command.from);
  const to = parseSquare(command.to);
  if (!from || !to) {
    return { ok: false, error: { reason: "notation", message: INVALID_NOTATION_MESSAGE } };
  }

  const result = attemptMove(state, from, to);
  if (!result.ok) {
    return {
      ok: false,
      error: { reason: result.error, message: describeRejection(state, result.error, from) }
    };
  }
  return result;
};
