import { io } from "socket.io-client";
import { SocketIoClientTransport, type TextFrameClientSocket } from "@coinrush/netcode";
import { loadClientConfig } from "./config.js";
import { GameClient } from "./client/game-client.js";
import { Wanderer } from "./client/wanderer.js";
import { formatHud } from "./client/hud.js";

const config = loadClientConfig();

const client = new GameClient({
  playerName: config.playerName,
  latencyMs: config.latencyMs,
  connect: () => {
    const socket: TextFrameClientSocket = io(config.serverUrl, {
      transports: ["websocket"],
      // A dropped connection ends the session; restart() opens a new one
      reconnection: false,
    });
    return new SocketIoClientTransport(socket);
  },
});

const wanderer = new Wanderer();
let idleSince: number | null = null;

// Stand-in for keyboard input and the screen
const controlInterval = setInterval(() => {
  const view = client.getRenderView();
  if (view.phase === "playing") {
    client.setDirections(wanderer.next(Date.now()));
  }

  if (view.phase === "game_over" || view.phase === "disconnected") {
    idleSince ??= Date.now();
    if (Date.now() - idleSince >= 5000) {
      idleSince = null;
      client.restart();
    }
  }
}, 100);

const hudInterval = setInterval(() => {
  console.log(formatHud(client.getRenderView()));
}, 2000);

console.log(`🎮 ${config.playerName} connecting to ${config.serverUrl}`);
client.start();

function shutdown(): void {
  clearInterval(controlInterval);
  clearInterval(hudInterval);
  client.stop();
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
