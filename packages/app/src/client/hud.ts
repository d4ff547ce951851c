import type { RenderView } from "./game-client.js";

/**
 * One-line text rendering of a view for the headless client.
 */
export function formatHud(view: RenderView): string {
  switch (view.phase) {
    case "connecting":
      return "[HUD] Connecting...";
    case "disconnected":
      return "[HUD] Disconnected";
    case "lobby": {
      const lobby = view.lobby;
      const waiting = lobby
        ? `${lobby.playerCount}/${lobby.required} players: ${lobby.playerNames.join(", ")}`
        : "waiting for players";
      const countdown = view.countdown !== null ? ` | starting in ${view.countdown}` : "";
      return `[HUD] Lobby ${waiting}${countdown}`;
    }
    case "playing": {
      const scores = view.players.map((player) => `${player.name}: ${player.score}`).join(", ");
      return `[HUD] ${Math.ceil(view.timeRemaining)}s left | ping ${view.latencyMs}ms | ${scores}`;
    }
    case "game_over": {
      const scores = Object.entries(view.finalScores)
        .map(([id, score]) => {
          const name = view.players.find((player) => player.id === id)?.name ?? id;
          return `${name}: ${score}`;
        })
        .join(", ");
      return `[HUD] Game over! Winner: ${view.winnerName ?? "nobody"} | ${scores}`;
    }
  }
}
