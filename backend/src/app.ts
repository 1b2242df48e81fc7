import cors from "cors";
import express from "express";
import type { Express } from "express";
import type { GameManager } from "./gameManager";

export const createApp = (gameManager: GameManager): Express => {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.post("/api/games", (_req, res) => {
    const game = gameManager.createGame();
    res.status(201).json({ id: game.id });
  });

  app.get("/api/games/:id", (req, res) => {
    const summary = gameManager.getGameSummary(req.params.id);
    if (!summary) {
      res.status(404).json({ error: "Game not found" });
      return;
    }
    res.json(summary);
  });

  app.get("/api/games/:id/board", (req, res) => {
    const text = gameManager.renderGame(req.params.id);
    if (text === undefined) {
      res.status(404).json({ error: "Game not found" });
      return;
    }
    res.json({ text });
  });

  return app;
};
