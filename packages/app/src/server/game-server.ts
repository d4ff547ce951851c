import {
  type Clock,
  DeliverySimulator,
  type Transport,
  requirePositive,
  sendIfOpen,
} from "@coinrush/netcode";
import {
  type ClientMessage,
  type EngineEvent,
  type GameConfig,
  ProtocolError,
  type ServerMessage,
  SimulationEngine,
  coinCollectedMessage,
  decodeClientMessage,
  encodeMessage,
  gameOverMessage,
  gameStartMessage,
  gameStateMessage,
  lobbyStatus,
  lobbyUpdateMessage,
  runCountdown,
  welcomeMessage,
} from "@coinrush/coin-collector";
import { randomUUID } from "node:crypto";

/**
 * A text frame tagged with the connection it came from or goes to.
 */
interface Frame {
  connectionId: string;
  text: string;
}

interface Connection {
  transport: Transport;
  /** Set once the connection has joined the current lobby or match */
  playerId: string | null;
}

export interface GameServerOptions {
  /** Engine to drive (default: a new engine built from `config`) */
  engine?: SimulationEngine;
  /** Overrides for a default engine; ignored when `engine` is given */
  config?: Partial<GameConfig>;
  /** One-way latency applied to every inbound and outbound frame */
  latencyMs?: number;
  pollIntervalMs?: number;
  now?: Clock;
  /** Player id generator (default: first 8 characters of a random UUID) */
  createPlayerId?: () => string;
}

export type ServerPhase = "lobby" | "countdown" | "playing" | "game_over";

export interface ServerStatus {
  phase: ServerPhase;
  players: number;
  connections: number;
}

/**
 * Authoritative game server.
 *
 * Every connection shares one delivery simulator: frames are delayed on the
 * way in and on the way out, then handled on the event loop like everything
 * else. The tick loop advances the engine at the configured rate and
 * broadcasts a snapshot whenever the broadcast interval has elapsed.
 *
 * @example
 * ```ts
 * const server = new GameServer({ latencyMs: 200 });
 * server.start();
 * io.on("connection", (socket) => server.connect(new SocketIoServerTransport(socket)));
 * ```
 */
export class GameServer {
  readonly engine: SimulationEngine;
  private readonly config: GameConfig;
  private readonly now: Clock;
  private readonly createPlayerId: () => string;
  private readonly delivery: DeliverySimulator<Frame, Frame>;
  private readonly connections: Map<string, Connection> = new Map();
  private readonly tickIntervalMs: number;
  private readonly broadcastIntervalMs: number;

  private tickIntervalId: ReturnType<typeof setInterval> | null = null;
  private inLobby = true;
  private countdown: Promise<void> | null = null;
  // Bumped on every reset so a countdown from an earlier lobby never starts a match
  private lobbyGeneration = 0;
  private lastTickTime = 0;
  private lastBroadcastTime = 0;

  constructor(options: GameServerOptions = {}) {
    this.now = options.now ?? Date.now;
    this.engine = options.engine ?? new SimulationEngine({ config: options.config, now: this.now });
    this.config = this.engine.config;
    this.createPlayerId = options.createPlayerId ?? (() => randomUUID().slice(0, 8));

    const tickRate = requirePositive(this.config.serverTickRate, "tickRate", "GameServer");
    const broadcastRate = requirePositive(this.config.broadcastRate, "broadcastRate", "GameServer");
    this.tickIntervalMs = 1000 / tickRate;
    this.broadcastIntervalMs = 1000 / broadcastRate;

    this.delivery = new DeliverySimulator<Frame, Frame>({
      latencyMs: options.latencyMs,
      pollIntervalMs: options.pollIntervalMs,
      now: this.now,
      deliverInbound: (frame) => this.handleFrame(frame),
      deliverOutbound: (frame) => this.deliverFrame(frame),
    });
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  start(): void {
    if (this.tickIntervalId !== null) {
      return; // Already running
    }
    this.delivery.start();
    this.lastTickTime = this.now();
    this.tickIntervalId = setInterval(() => {
      this.tick();
    }, this.tickIntervalMs);
    console.log(
      `[GameServer] Started at ${this.config.serverTickRate} Hz, broadcasting at ${this.config.broadcastRate} Hz, ${this.delivery.getLatency()}ms simulated latency`,
    );
  }

  stop(): void {
    if (this.tickIntervalId !== null) {
      clearInterval(this.tickIntervalId);
      this.tickIntervalId = null;
    }
    this.delivery.stop();
    this.lobbyGeneration++;
    this.countdown = null;
    console.log("[GameServer] Stopped");
  }

  isRunning(): boolean {
    return this.tickIntervalId !== null;
  }

  getStatus(): ServerStatus {
    return {
      phase: this.getPhase(),
      players: this.engine.playerCount,
      connections: this.connections.size,
    };
  }

  getPhase(): ServerPhase {
    if (this.engine.isOver()) return "game_over";
    if (this.engine.isStarted()) return "playing";
    return this.countdown ? "countdown" : "lobby";
  }

  // ===========================================================================
  // Connections
  // ===========================================================================

  /**
   * Register a new connection. It becomes a player once its `join` arrives.
   */
  connect(transport: Transport): void {
    const connectionId = transport.id;
    this.connections.set(connectionId, { transport, playerId: null });
    console.log(`[GameServer] Connection opened: ${connectionId}`);

    transport.onMessage((text) => {
      this.delivery.receive({ connectionId, text });
    });
    transport.onClose(() => {
      this.handleClose(connectionId);
    });
  }

  private handleClose(connectionId: string): void {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      return;
    }
    this.connections.delete(connectionId);
    console.log(`[GameServer] Connection closed: ${connectionId}`);
    this.removePlayer(connection);
  }

  private handleFrame(frame: Frame): void {
    const connection = this.connections.get(frame.connectionId);
    if (!connection) {
      return; // Closed while the frame was in flight
    }

    let message: ClientMessage;
    try {
      message = decodeClientMessage(frame.text);
    } catch (error) {
      if (error instanceof ProtocolError) {
        console.warn(`[GameServer] Dropping message from ${frame.connectionId}: ${error.message}`);
        return;
      }
      throw error;
    }

    switch (message.type) {
      case "join":
        this.handleJoin(connection, message.name);
        break;
      case "input":
        if (connection.playerId !== null) {
          this.engine.submitInput(connection.playerId, message.directions, message.sequence);
        }
        break;
      case "leave":
        this.removePlayer(connection);
        break;
    }
  }

  private handleJoin(connection: Connection, name: string): void {
    if (connection.playerId !== null) {
      console.warn(`[GameServer] ${connection.transport.id} joined twice, ignoring`);
      return;
    }

    if (this.engine.isOver()) {
      this.resetToLobby();
    }

    if (this.engine.playerCount >= this.config.maxPlayers) {
      console.warn(`[GameServer] Server full, rejecting ${name}`);
      connection.transport.close();
      return;
    }

    const playerId = this.createPlayerId();
    connection.playerId = playerId;
    const player = this.engine.addPlayer(playerId, name);
    console.log(`[GameServer] Player ${name} (${playerId}) joined`);

    this.sendTo(connection, welcomeMessage(player.id, player.colorIndex));
    this.broadcastLobbyUpdate();

    if (this.inLobby && this.engine.canStart()) {
      this.startCountdown();
    }
  }

  private removePlayer(connection: Connection): void {
    const playerId = connection.playerId;
    if (playerId === null) {
      return;
    }
    connection.playerId = null;
    const player = this.engine.removePlayer(playerId);
    console.log(`[GameServer] Player ${player?.name ?? playerId} left`);

    if (this.engine.playerCount === 0) {
      this.resetToLobby();
    }
    if (this.inLobby) {
      this.broadcastLobbyUpdate();
    }
  }

  /**
   * Forget every player and start a fresh lobby. Open connections stay open
   * and may join again. Frames already in flight are still delivered.
   */
  private resetToLobby(): void {
    console.log("[GameServer] Resetting to lobby");
    for (const connection of this.connections.values()) {
      connection.playerId = null;
    }
    this.engine.reset();
    this.inLobby = true;
    this.countdown = null;
    this.lobbyGeneration++;
  }

  // ===========================================================================
  // Countdown
  // ===========================================================================

  private startCountdown(): void {
    if (this.countdown) {
      return; // Already counting down
    }
    const generation = this.lobbyGeneration;
    const current = () => generation === this.lobbyGeneration;

    this.countdown = runCountdown({
      seconds: this.config.countdownSeconds,
      onStep: (remaining) => {
        console.log(`[GameServer] Starting in ${remaining}...`);
        this.broadcast(gameStartMessage(remaining));
      },
      shouldContinue: () => current() && this.inLobby && this.engine.canStart(),
    })
      .then((completed) => {
        if (!current()) {
          return;
        }
        this.countdown = null;
        if (!completed) {
          console.log("[GameServer] Countdown cancelled, not enough players");
          return;
        }
        this.beginMatch();
      })
      .catch((error: unknown) => {
        console.error("[GameServer] Countdown failed:", error);
        this.countdown = null;
      });
  }

  private beginMatch(): void {
    this.inLobby = false;
    this.engine.startGame();
    const now = this.now();
    this.lastTickTime = now;
    this.lastBroadcastTime = now;
    console.log(`[GameServer] Game started with ${this.engine.playerCount} players`);
    this.broadcast(gameStateMessage(this.engine.snapshot()));
  }

  // ===========================================================================
  // Simulation loop
  // ===========================================================================

  /**
   * One server tick: advance the match, publish its events, and broadcast a
   * snapshot when one is due.
   */
  tick(): void {
    const now = this.now();
    const deltaMs = now - this.lastTickTime;
    this.lastTickTime = now;

    if (!this.engine.isStarted() || this.engine.isOver()) {
      return;
    }

    for (const event of this.engine.advance(deltaMs)) {
      this.publish(event);
    }

    if (!this.engine.isOver() && now - this.lastBroadcastTime >= this.broadcastIntervalMs) {
      this.lastBroadcastTime = now;
      this.broadcast(gameStateMessage(this.engine.snapshot()));
    }
  }

  private publish(event: EngineEvent): void {
    switch (event.type) {
      case "coin_collected": {
        const collector = this.engine.getPlayer(event.collectorId);
        console.log(
          `[GameServer] ${collector?.name ?? event.collectorId} collected ${event.coinId} (score ${event.newScore})`,
        );
        this.broadcast(coinCollectedMessage(event.coinId, event.collectorId, event.newScore));
        break;
      }
      case "game_over":
        console.log(`[GameServer] Game over, winner: ${event.winnerName ?? "nobody"}`);
        this.broadcast(gameOverMessage(event.winnerId, event.winnerName, event.finalScores));
        break;
    }
  }

  // ===========================================================================
  // Outbound
  // ===========================================================================

  private broadcastLobbyUpdate(): void {
    const status = lobbyStatus(this.engine.getPlayers(), this.config.minPlayers);
    this.broadcast(lobbyUpdateMessage(status.playerCount, status.required, status.playerNames));
  }

  /**
   * Queue a message for every joined connection.
   */
  private broadcast(message: ServerMessage): void {
    const text = encodeMessage(message);
    for (const [connectionId, connection] of this.connections) {
      if (connection.playerId !== null) {
        this.delivery.send({ connectionId, text });
      }
    }
  }

  private sendTo(connection: Connection, message: ServerMessage): void {
    this.delivery.send({ connectionId: connection.transport.id, text: encodeMessage(message) });
  }

  private deliverFrame(frame: Frame): void {
    const connection = this.connections.get(frame.connectionId);
    if (!connection) {
      return; // Unknown or closed peer
    }
    sendIfOpen(connection.transport, frame.text);
  }
}
