import { createServer } from "node:http";
import { Server } from "socket.io";
import { SocketIoServerTransport, type TextFrameEvents } from "@coinrush/netcode";
import { loadServerConfig } from "./config.js";
import { GameServer } from "./server/game-server.js";

const startTime = Date.now();
const config = loadServerConfig();

const gameServer = new GameServer({ latencyMs: config.latencyMs });

const httpServer = createServer((request, response) => {
  if (request.method === "GET" && request.url === "/api/health") {
    response.writeHead(200, { "Content-Type": "application/json" });
    response.end(
      JSON.stringify({
        status: "ok",
        timestamp: new Date().toISOString(),
        uptime: Date.now() - startTime,
        game: gameServer.getStatus(),
      }),
    );
    return;
  }
  response.writeHead(404, { "Content-Type": "application/json" });
  response.end(JSON.stringify({ error: "Not found" }));
});

const io = new Server<TextFrameEvents, TextFrameEvents>(httpServer, {
  // Generous heartbeat so a stalled client is not dropped mid-match
  pingTimeout: 60000,
  pingInterval: 25000,
});

io.on("connection", (socket) => {
  gameServer.connect(new SocketIoServerTransport(socket));
});

gameServer.start();

httpServer.listen(config.port, config.host, () => {
  console.log(`🚀 Server running at http://${config.host}:${config.port}`);
  console.log(`📡 Simulated latency: ${config.latencyMs}ms each way`);
});

function shutdown(): void {
  console.log("🛑 Shutting down");
  gameServer.stop();
  io.disconnectSockets(true);
  httpServer.close((error) => {
    if (error) {
      console.error("[GameServer] Error while closing:", error);
      process.exitCode = 1;
    }
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
