import { randomUUID } from "crypto";
import { applyMoveCommand, colorName, createGame, formatSquare, renderBoard } from "@rankfile/shared";
import type {
  AppliedMove,
  ClientMessage,
  GameBroadcast,
  GameState,
  MoveCommand,
  PlayerColor,
  PlayerDescriptor,
  SeatRole,
  ServerMessage
} from "@rankfile/shared";
import { z } from "zod";

/** The part of a `ws` socket the manager writes to. */
export interface MessageSocket {
  send(data: string): void;
}

interface ConnectionContext {
  id: string;
  socket: MessageSocket;
  name?: string;
  gameId?: string;
  role?: SeatRole;
}

interface PlayerSeat {
  connectionId: string;
  name: string;
}

interface GameRoom {
  state: GameState;
  players: Partial<Record<PlayerColor, PlayerSeat>>;
  spectators: Set<string>;
}

export interface GameSummary {
  id: string;
  phase: GameState["phase"];
  whiteToMove: boolean;
  moveCount: number;
  players: PlayerDescriptor[];
  createdAt: number;
  updatedAt: number;
  winner?: PlayerColor;
}

const squareSchema = z.string().trim().min(1).max(4);

const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("join"),
    gameId: z.string().min(1),
    name: z.string().min(1)
  }),
  z.object({
    type: z.literal("makeMove"),
    move: z.object({
      from: squareSchema,
      to: squareSchema
    })
  }),
  z.object({
    type: z.literal("requestState")
  })
] as const);

const COLORS: PlayerColor[] = ["white", "black"];

/**
 * Owns every running game and the sockets attached to it. Each move is
 * validated and applied synchronously, so two messages for the same game can
 * never interleave.
 */
export class GameManager {
  private rooms: Map<string, GameRoom> = new Map();
  private connections: Map<string, ConnectionContext> = new Map();

  createGame(): GameState {
    const id = randomUUID();
    const state = createGame(id);
    this.rooms.set(id, {
      state,
      players: {},
      spectators: new Set()
    });
    return state;
  }

  getGameState(gameId: string): GameState | undefined {
    return this.rooms.get(gameId)?.state;
  }

  getGameSummary(gameId: string): GameSummary | undefined {
    const room = this.rooms.get(gameId);
    if (!room) return undefined;
    const { state } = room;
    return {
      id: state.id,
      phase: state.phase,
      whiteToMove: state.whiteToMove,
      moveCount: state.moveCount,
      players: this.describePlayers(room),
      createdAt: state.createdAt,
      updatedAt: state.updatedAt,
      winner: state.winner
    };
  }

  renderGame(gameId: string): string | undefined {
    const state = this.getGameState(gameId);
    return state ? renderBoard(state) : undefined;
  }

  addConnection(socket: MessageSocket): ConnectionContext {
    const context: ConnectionContext = {
      id: randomUUID(),
      socket
    };
    this.connections.set(context.id, context);
    return context;
  }

  removeConnection(connectionId: string): void {
    const context = this.connections.get(connectionId);
    if (!context) return;
    this.connections.delete(connectionId);

    if (context.gameId) {
      if (!this.rooms.has(context.gameId)) return;
      this.leaveGame(context);
      this.broadcast(context.gameId, {
        type: "info",
        message: `${context.name ?? "A player"} disconnected`
      });
      this.broadcastState(context.gameId);
    }
  }

  handleRawMessage(connectionId: string, raw: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.sendError(connectionId, "Invalid JSON payload");
      return;
    }
    const parseResult = clientMessageSchema.safeParse(parsed);
    if (!parseResult.success) {
      this.sendError(connectionId, "Invalid message payload");
      return;
    }
    this.handleMessage(connectionId, parseResult.data);
  }

  private handleMessage(connectionId: string, message: ClientMessage): void {
    const connection = this.connections.get(connectionId);
    if (!connection) return;

    switch (message.type) {
      case "join":
        this.handleJoin(connection, message.gameId, message.name);
        break;
      case "makeMove":
        this.handleMakeMove(connection, message.move);
        break;
      case "requestState":
        if (connection.gameId) {
          this.broadcastState(connection.gameId, connectionId);
        } else {
          this.sendError(connectionId, "Join a game first");
        }
        break;
      default:
        this.sendError(connectionId, "Unsupported message");
    }
  }

  private handleJoin(connection: ConnectionContext, gameId: string, name: string): void {
    const room = this.rooms.get(gameId);
    if (!room) {
      this.sendError(connection.id, "Game not found");
      return;
    }

    const previousGameId = connection.gameId;
    const previousName = connection.name;
    if (previousGameId) {
      this.leaveGame(connection);
    }

    const assignedRole = this.assignRole(room, connection.id, name);
    connection.gameId = gameId;
    connection.role = assignedRole;
    connection.name = name;

    if (previousGameId && previousGameId !== gameId) {
      this.broadcast(previousGameId, {
        type: "info",
        message: `${previousName ?? name} left the game`
      });
      this.broadcastState(previousGameId);
    }

    this.send(connection.id, {
      type: "ack",
      connectionId: connection.id,
      role: assignedRole
    });

    this.broadcast(gameId, {
      type: "info",
      message: `${name} joined as ${assignedRole}`
    });
    this.broadcastState(gameId);
  }

  private leaveGame(connection: ConnectionContext): void {
    if (!connection.gameId) return;
    const room = this.rooms.get(connection.gameId);
    if (!room) return;

    if (connection.role === "white" || connection.role === "black") {
      if (room.players[connection.role]?.connectionId === connection.id) {
        delete room.players[connection.role];
      }
    } else if (connection.role === "spectator") {
      room.spectators.delete(connection.id);
    }
  }

  private handleMakeMove(connection: ConnectionContext, command: MoveCommand): void {
    if (!connection.gameId || !connection.role || connection.role === "spectator") {
      this.sendError(connection.id, "You must join as a player to move pieces");
      return;
    }
    const room = this.rooms.get(connection.gameId);
    if (!room) {
      this.sendError(connection.id, "Game not found");
      return;
    }

    const result = applyMoveCommand(room.state, connection.role, command);
    if (!result.ok) {
      this.sendError(connection.id, result.error.message);
      return;
    }

    const captureText = describeCapture(result.value);
    if (captureText) {
      this.broadcast(connection.gameId, { type: "info", message: captureText });
    }

    if (room.state.phase === "completed" && room.state.winner) {
      this.broadcast(connection.gameId, {
        type: "info",
        message: `Game over. ${colorName(room.state.winner)} wins!`
      });
    }

    this.broadcastState(connection.gameId);
  }

  private assignRole(room: GameRoom, connectionId: string, name: string): SeatRole {
    for (const color of COLORS) {
      if (!room.players[color]) {
        room.players[color] = { connectionId, name };
        return color;
      }
    }
    room.spectators.add(connectionId);
    return "spectator";
  }

  private broadcastState(gameId: string, targetConnection?: string): void {
    const room = this.rooms.get(gameId);
    if (!room) return;

    const message: ServerMessage = {
      type: "state",
      payload: this.buildBroadcast(room)
    };

    if (targetConnection) {
      this.send(targetConnection, message);
      return;
    }

    this.recipients(room).forEach((id) => this.send(id, message));
  }

  private broadcast(gameId: string, message: ServerMessage): void {
    const room = this.rooms.get(gameId);
    if (!room) return;
    this.recipients(room).forEach((id) => this.send(id, message));
  }

  private recipients(room: GameRoom): string[] {
    return [
      ...room.spectators,
      ...Object.values(room.players)
        .filter((seat): seat is PlayerSeat => Boolean(seat))
        .map((seat) => seat.connectionId)
    ];
  }

  private send(connectionId: string, message: ServerMessage): void {
    const connection = this.connections.get(connectionId);
    if (!connection) return;
    try {
      connection.socket.send(JSON.stringify(message));
    } catch (error) {
      console.error("Failed to send message", error);
    }
  }

  private sendError(connectionId: string, message: string): void {
    this.send(connectionId, {
      type: "error",
      message
    });
  }

  private describePlayers(room: GameRoom): PlayerDescriptor[] {
    return COLORS.map((color) => ({
      color,
      name: room.players[color]?.name,
      connected: Boolean(room.players[color])
    }));
  }

  private buildBroadcast(room: GameRoom): GameBroadcast {
    return {
      state: room.state,
      players: this.describePlayers(room)
    };
  }
}

const describeCapture = ({ piece, captured, to }: AppliedMove): string | undefined => {
  if (!captured) return undefined;
  return `${colorName(piece.color)} captured a ${captured.kind} on ${formatSquare(to)}.`;
};
