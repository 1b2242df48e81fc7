import type { Board } from "./game/board";

export type PlayerColor = "white" | "black";

export type PieceKind = "pawn" | "knight" | "bishop" | "rook" | "queen" | "king";

export interface Piece {
  readonly kind: PieceKind;
  readonly color: PlayerColor;
}

export type GamePhase = "in-progress" | "completed";

export interface GameState {
  id: string;
  phase: GamePhase;
  createdAt: number;
  updatedAt: number;
  board: Board;
  whiteToMove: boolean;
  moveCount: number;
  winner?: PlayerColor;
}

/** A move as players type it: two algebraic square labels such as "e2" and "e4". */
export interface MoveCommand {
  from: string;
  to: string;
}

export type SeatRole = PlayerColor | "spectator";

export interface PlayerDescriptor {
  color: PlayerColor;
  name?: string;
  connected: boolean;
}

export interface GameBroadcast {
  state: GameState;
  players: PlayerDescriptor[];
}

export type ClientMessage =
  | {
      type: "join";
      gameId: string;
      name: string;
    }
  | {
      type: "makeMove";
      move: MoveCommand;
    }
  | {
      type: "requestState";
    };

export type ServerMessage =
  | {
      type: "ack";
      connectionId: string;
      role: SeatRole;
    }
  | {
      type: "state";
      payload: GameBroadcast;
    }
  | {
      type: "error";
      message: string;
    }
  | {
      type: "info";
      message: string;
    };
