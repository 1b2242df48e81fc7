import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";
import { createApp } from "../src/app";
import { GameManager } from "../src/gameManager";

describe("http api", () => {
  let manager: GameManager;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    manager = new GameManager();
    app = createApp(manager);
  });

  it("reports health", async () => {
    const response = await request(app).get("/health");
    expect(response.status).toBe(200);
    expect(response.body).toStrictEqual({ ok: true });
  });

  it("creates a game and summarises it", async () => {
    const created = await request(app).post("/api/games");
    expect(created.status).toBe(201);
    const id: string = created.body.id;
    expect(manager.getGameState(id)).toBeDefined();

    const summary = await request(app).get(`/api/games/${id}`);
    expect(summary.status).toBe(200);
    expect(summary.body).toMatchObject({
      id,
      phase: "in-progress",
      whiteToMove: true,
      moveCount: 0,
      players: [
        { color: "white", connected: false },
        { color: "black", connected: false }
      ]
    });
  });

  it("renders the board as text", async () => {
    const { id } = manager.createGame();
    const response = await request(app).get(`/api/games/${id}/board`);
    expect(response.status).toBe(200);
    const lines: string[] = response.body.text.split("\n");
    expect(lines[2]).toBe("8 |r n b q k b n r | 8");
    expect(lines[13]).toBe("White to move");
  });

  it("returns 404 for unknown games", async () => {
    const summary = await request(app).get("/api/games/missing");
    expect(summary.status).toBe(404);
    expect(summary.body).toStrictEqual({ error: "Game not found" });

    const board = await request(app).get("/api/games/missing/board");
    expect(board.status).toBe(404);
  });
});
