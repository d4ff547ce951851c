import {
  type ClientMessage,
  type GameConfig,
  type ServerMessage,
  decodeServerMessage,
  encodeMessage,
  inputMessage,
  joinMessage,
  leaveMessage,
} from "@coinrush/coin-collector";
import { createTestEngine, sequentialIds } from "@coinrush/coin-collector/test-utils";
import { type MemoryTransport, createTransportPair } from "@coinrush/netcode";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { GameServer } from "./game-server.js";

interface TestClient {
  transport: MemoryTransport;
  received: ServerMessage[];
  send: (message: ClientMessage) => void;
}

const countdowns = (received: ServerMessage[]): number[] =>
  received.flatMap((message) => (message.type === "game_start" ? [message.countdown] : []));

const snapshots = (received: ServerMessage[]) =>
  received.flatMap((message) => (message.type === "game_state" ? [message.snapshot] : []));

describe("GameServer", () => {
  let server: GameServer;

  const createServer = (config: Partial<GameConfig> = {}, latencyMs = 0): GameServer => {
    const { engine } = createTestEngine({ config, now: () => Date.now() });
    return new GameServer({
      engine,
      latencyMs,
      now: () => Date.now(),
      createPlayerId: sequentialIds("p"),
    });
  };

  const connectClient = (id: string): TestClient => {
    const [transport, serverEnd] = createTransportPair(id);
    const received: ServerMessage[] = [];
    transport.onMessage((text) => received.push(decodeServerMessage(text)));
    server.connect(serverEnd);
    return {
      transport,
      received,
      send: (message) => transport.send(encodeMessage(message)),
    };
  };

  const joinTwo = async (): Promise<[TestClient, TestClient]> => {
    const a = connectClient("client-a");
    const b = connectClient("client-b");
    a.send(joinMessage("Ada"));
    b.send(joinMessage("Bob"));
    await vi.advanceTimersByTimeAsync(5);
    return [a, b];
  };

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(1_000_000);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    server = createServer();
  });

  afterEach(() => {
    server.stop();
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  describe("construction", () => {
    test("should reject a non-positive tick rate", () => {
      expect(() => createServer({ serverTickRate: 0 })).toThrow(
        "[GameServer] tickRate must be a positive finite number. Got: 0",
      );
    });

    test("should start and stop the loop", () => {
      expect(server.isRunning()).toBe(false);
      server.start();
      server.start();
      expect(server.isRunning()).toBe(true);
      server.stop();
      expect(server.isRunning()).toBe(false);
    });
  });

  describe("lobby", () => {
    test("should welcome a joining player and announce the lobby", async () => {
      server.start();
      const a = connectClient("client-a");
      a.send(joinMessage("Ada"));
      await vi.advanceTimersByTimeAsync(5);

      expect(a.received).toEqual([
        { type: "welcome", playerId: "p-1", colorIndex: 0 },
        { type: "lobby_update", playerCount: 1, required: 2, playerNames: ["Ada"] },
      ]);
      expect(server.getPhase()).toBe("lobby");
    });

    test("should delay replies by both simulated legs", async () => {
      server = createServer({}, 200);
      server.start();
      const a = connectClient("client-a");
      a.send(joinMessage("Ada"));

      await vi.advanceTimersByTimeAsync(395);
      expect(a.received).toEqual([]);

      await vi.advanceTimersByTimeAsync(10);
      expect(a.received[0]).toEqual({ type: "welcome", playerId: "p-1", colorIndex: 0 });
    });

    test("should count down 3, 2, 1 and then send a started snapshot", async () => {
      server.start();
      const [a, b] = await joinTwo();

      await vi.advanceTimersByTimeAsync(3100);

      for (const client of [a, b]) {
        const sequence = client.received
          .map((message) => message.type)
          .filter((type) => type === "game_start" || type === "game_state")
          .slice(0, 4);
        expect(sequence).toEqual(["game_start", "game_start", "game_start", "game_state"]);
        expect(countdowns(client.received)).toEqual([3, 2, 1]);

        const first = snapshots(client.received)[0];
        expect(first?.started).toBe(true);
        expect(first?.players.map((player) => player.name)).toEqual(["Ada", "Bob"]);
      }
      expect(server.getPhase()).toBe("playing");
    });

    test("should cancel the countdown when a player leaves", async () => {
      server.start();
      const [a, b] = await joinTwo();

      b.send(leaveMessage());
      await vi.advanceTimersByTimeAsync(3100);

      expect(countdowns(a.received)).toEqual([3]);
      expect(snapshots(a.received)).toEqual([]);
      expect(a.received.at(-1)).toEqual({
        type: "lobby_update",
        playerCount: 1,
        required: 2,
        playerNames: ["Ada"],
      });
      expect(server.getPhase()).toBe("lobby");
    });

    test("should close connections that join a full server", async () => {
      server.start();
      const clients = ["a", "b", "c", "d", "e"].map((id) => connectClient(`client-${id}`));
      for (const client of clients) {
        client.send(joinMessage("Player"));
      }
      await vi.advanceTimersByTimeAsync(5);

      expect(server.engine.playerCount).toBe(4);
      expect(clients[4]?.transport.isClosed()).toBe(true);
      expect(clients[4]?.received).toEqual([]);
      expect(server.getStatus().connections).toBe(4);
    });

    test("should ignore a second join from the same connection", async () => {
      server.start();
      const a = connectClient("client-a");
      a.send(joinMessage("Ada"));
      a.send(joinMessage("Ada again"));
      await vi.advanceTimersByTimeAsync(5);

      expect(server.engine.playerCount).toBe(1);
    });
  });

  describe("match", () => {
    test("should apply inputs from joined players", async () => {
      server.start();
      const [a] = await joinTwo();
      await vi.advanceTimersByTimeAsync(3100);

      a.send(inputMessage(["right"], 1));
      await vi.advanceTimersByTimeAsync(5);

      expect(server.engine.getInputState("p-1")).toEqual({
        directions: ["right"],
        lastInputSequence: 1,
      });
    });

    test("should drop malformed frames and keep the connection", async () => {
      server.start();
      const [a] = await joinTwo();
      await vi.advanceTimersByTimeAsync(3100);

      a.transport.send("not json");
      a.send(inputMessage(["up"], 1));
      await vi.advanceTimersByTimeAsync(5);

      expect(console.warn).toHaveBeenCalledWith(
        "[GameServer] Dropping message from client-a: Frame is not valid JSON: not json",
      );
      expect(a.transport.isClosed()).toBe(false);
      expect(server.engine.getInputState("p-1")?.directions).toEqual(["up"]);
    });

    test("should broadcast snapshots at the broadcast rate", async () => {
      server.start();
      const [a] = await joinTwo();
      await vi.advanceTimersByTimeAsync(3100);
      const before = snapshots(a.received).length;

      await vi.advanceTimersByTimeAsync(1000);

      const sent = snapshots(a.received).length - before;
      // Ticks land on whole milliseconds, so some broadcasts slip by one tick
      expect(sent).toBeGreaterThanOrEqual(15);
      expect(sent).toBeLessThanOrEqual(21);
    });

    test("should announce coin pickups", async () => {
      server.start();
      const [a, b] = await joinTwo();
      await vi.advanceTimersByTimeAsync(3100);

      const coin = server.engine.spawnCoin({ x: 210, y: 150 });
      await vi.advanceTimersByTimeAsync(50);

      const expected: ServerMessage = {
        type: "coin_collected",
        coinId: coin.id,
        collectorId: "p-1",
        newScore: 1,
      };
      expect(a.received).toContainEqual(expected);
      expect(b.received).toContainEqual(expected);
    });

    test("should announce the winner when time runs out", async () => {
      server = createServer({ gameDurationMs: 1000 });
      server.start();
      const [a] = await joinTwo();
      await vi.advanceTimersByTimeAsync(3100);
      await vi.advanceTimersByTimeAsync(1100);

      expect(a.received.at(-1)).toEqual({
        type: "game_over",
        winnerId: "p-1",
        winnerName: "Ada",
        finalScores: { "p-1": 0, "p-2": 0 },
      });
      expect(server.getPhase()).toBe("game_over");
    });

    test("should open a new lobby when someone joins after game over", async () => {
      server = createServer({ gameDurationMs: 1000 });
      server.start();
      const [a] = await joinTwo();
      await vi.advanceTimersByTimeAsync(4200);
      const seenByA = a.received.length;

      const c = connectClient("client-c");
      c.send(joinMessage("Cy"));
      await vi.advanceTimersByTimeAsync(5);

      expect(c.received).toEqual([
        { type: "welcome", playerId: "p-3", colorIndex: 0 },
        { type: "lobby_update", playerCount: 1, required: 2, playerNames: ["Cy"] },
      ]);
      expect(a.received.length).toBe(seenByA);
      expect(server.getPhase()).toBe("lobby");
    });

    test("should still deliver game over to the old players when a join resets the lobby", async () => {
      server = createServer({ gameDurationMs: 1000 }, 200);
      server.start();
      const a = connectClient("client-a");
      const b = connectClient("client-b");
      a.send(joinMessage("Ada"));
      b.send(joinMessage("Bob"));

      // Joins land at 200ms, the match starts at 3200ms and ends at 4200ms.
      // Cy's join lands at 4300ms, before game over reaches Ada at 4400ms.
      await vi.advanceTimersByTimeAsync(4100);
      const c = connectClient("client-c");
      c.send(joinMessage("Cy"));
      await vi.advanceTimersByTimeAsync(1000);

      expect(server.getPhase()).toBe("lobby");
      expect(a.received.at(-1)).toEqual({
        type: "game_over",
        winnerId: "p-1",
        winnerName: "Ada",
        finalScores: { "p-1": 0, "p-2": 0 },
      });
      expect(c.received[0]).toEqual({ type: "welcome", playerId: "p-3", colorIndex: 0 });
    });
  });

  describe("disconnects", () => {
    test("should remove the player and update the lobby", async () => {
      server.start();
      const [a, b] = await joinTwo();

      b.transport.close();
      await vi.advanceTimersByTimeAsync(1100);

      expect(a.received.at(-1)).toEqual({
        type: "lobby_update",
        playerCount: 1,
        required: 2,
        playerNames: ["Ada"],
      });
      expect(server.getStatus()).toEqual({ phase: "lobby", players: 1, connections: 1 });
    });

    test("should reset once the last player of a match disconnects", async () => {
      server.start();
      const [a, b] = await joinTwo();
      await vi.advanceTimersByTimeAsync(3100);

      a.transport.close();
      expect(server.engine.playerCount).toBe(1);
      expect(server.getPhase()).toBe("playing");

      b.transport.close();
      expect(server.getStatus()).toEqual({ phase: "lobby", players: 0, connections: 0 });
      expect(server.engine.isStarted()).toBe(false);
    });

    test("should keep a join that was in flight when the last player left", async () => {
      server = createServer({}, 200);
      server.start();
      const a = connectClient("client-a");
      a.send(joinMessage("Ada"));
      await vi.advanceTimersByTimeAsync(500);

      const b = connectClient("client-b");
      b.send(joinMessage("Bob"));
      await vi.advanceTimersByTimeAsync(50);
      a.transport.close();
      await vi.advanceTimersByTimeAsync(1000);

      expect(b.received).toEqual([
        { type: "welcome", playerId: "p-2", colorIndex: 0 },
        { type: "lobby_update", playerCount: 1, required: 2, playerNames: ["Bob"] },
      ]);
      expect(server.getStatus()).toEqual({ phase: "lobby", players: 1, connections: 1 });
    });
  });
});
