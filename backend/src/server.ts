import { createServer } from "http";
import { WebSocketServer } from "ws";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { GameManager } from "./gameManager";

const config = loadConfig();
const gameManager = new GameManager();
const app = createApp(gameManager);

const httpServer = createServer(app);
const wss = new WebSocketServer({ server: httpServer, path: "/ws" });

wss.on("connection", (socket) => {
  const context = gameManager.addConnection(socket);

  socket.on("message", (data) => {
    gameManager.handleRawMessage(context.id, data.toString());
  });

  socket.on("close", () => {
    gameManager.removeConnection(context.id);
  });

  socket.on("error", (error) => {
    console.error("WebSocket error", error);
    gameManager.removeConnection(context.id);
  });
});

httpServer.listen(config.port, config.host, () => {
  console.log(`Server listening on http://${config.host}:${config.port} (${config.nodeEnv})`);
});
