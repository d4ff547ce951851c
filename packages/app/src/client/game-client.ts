import {
  type Clock,
  DEFAULT_INTERPOLATION_DELAY_MS,
  DEFAULT_SIMULATED_LATENCY_MS,
  InterpolationBuffer,
  LATENCY_SMOOTHING_WEIGHT,
  LatencyEstimator,
  type Transport,
  type Vector2,
  requirePositive,
} from "@coinrush/netcode";
import {
  CoinPrediction,
  type CoinState,
  DEFAULT_GAME_CONFIG,
  type Direction,
  type GameConfig,
  type GameSnapshot,
  LocalPlayerPredictor,
  type LobbyStatus,
  type PlayerState,
  type ServerMessage,
  inputMessage,
} from "@coinrush/coin-collector";
import { NetworkSession } from "./network-session.js";

export type ClientPhase = "connecting" | "lobby" | "playing" | "game_over" | "disconnected";

export interface RenderPlayer {
  readonly id: string;
  readonly name: string;
  readonly position: Readonly<Vector2>;
  readonly score: number;
  readonly colorIndex: number;
  readonly isLocal: boolean;
}

export interface RenderLobby {
  readonly playerCount: number;
  readonly required: number;
  readonly playerNames: readonly string[];
}

/**
 * Everything a renderer needs for one frame. Frozen; holds no live state.
 */
export interface RenderView {
  readonly phase: ClientPhase;
  readonly connected: boolean;
  readonly localPlayerId: string | null;
  readonly players: readonly RenderPlayer[];
  readonly coins: readonly Readonly<CoinState>[];
  /** Local player's score */
  readonly score: number;
  /** Match time left in seconds */
  readonly timeRemaining: number;
  readonly lobby: RenderLobby | null;
  readonly countdown: number | null;
  /** Smoothed round trip in milliseconds */
  readonly latencyMs: number;
  readonly winnerName: string | null;
  readonly finalScores: Readonly<Record<string, number>>;
}

export interface GameClientOptions {
  playerName: string;
  /** Opens a new connection; called on start and on every restart */
  connect: () => Transport;
  config?: Partial<GameConfig>;
  /** One-way latency applied to every inbound and outbound frame */
  latencyMs?: number;
  pollIntervalMs?: number;
  /** Local frames per second (default: 60) */
  frameRate?: number;
  interpolationDelayMs?: number;
  now?: Clock;
}

const freezePosition = (position: Vector2): Readonly<Vector2> =>
  Object.freeze({ x: position.x, y: position.y });

/**
 * Client frame loop.
 *
 * Each frame drains the session inbox, sends the held directions at the input
 * rate, predicts the local player and any coins it touches, and leaves remote
 * players to the interpolation buffer. Renderers only ever see
 * {@link RenderView} copies.
 */
export class GameClient {
  private readonly playerName: string;
  private readonly connect: () => Transport;
  private readonly config: GameConfig;
  private readonly latencyMs: number;
  private readonly pollIntervalMs: number | undefined;
  private readonly frameIntervalMs: number;
  private readonly inputIntervalMs: number;
  private readonly interpolationDelayMs: number;
  private readonly now: Clock;

  private readonly predictor: LocalPlayerPredictor;
  private readonly coins: CoinPrediction;
  private readonly interpolation = new InterpolationBuffer();
  private readonly latency: LatencyEstimator;
  private readonly players: Map<string, PlayerState> = new Map();

  private session: NetworkSession | null = null;
  private frameIntervalId: ReturnType<typeof setInterval> | null = null;
  private phase: ClientPhase = "connecting";
  private localPlayerId: string | null = null;
  private lobby: LobbyStatus | null = null;
  private countdown: number | null = null;
  private timeRemaining: number;
  private winnerName: string | null = null;
  private finalScores: Record<string, number> = {};
  // Receipt time minus server time of the newest snapshot; null before the first one
  private serverTimeOffset: number | null = null;
  private inputSequence = 0;
  private lastInputTime = 0;
  private lastFrameTime = 0;

  constructor(options: GameClientOptions) {
    this.playerName = options.playerName;
    this.connect = options.connect;
    this.config = { ...DEFAULT_GAME_CONFIG, ...options.config };
    this.latencyMs = options.latencyMs ?? DEFAULT_SIMULATED_LATENCY_MS;
    this.pollIntervalMs = options.pollIntervalMs;
    this.frameIntervalMs = 1000 / requirePositive(options.frameRate ?? 60, "frameRate", "GameClient");
    this.inputIntervalMs =
      1000 / requirePositive(this.config.clientInputRate, "clientInputRate", "GameClient");
    this.interpolationDelayMs = options.interpolationDelayMs ?? DEFAULT_INTERPOLATION_DELAY_MS;
    this.now = options.now ?? Date.now;

    this.predictor = new LocalPlayerPredictor(this.config);
    this.coins = new CoinPrediction(this.config.pickupRadius);
    // Both legs are delayed in each direction, so the first guess is twice the one-way value
    this.latency = new LatencyEstimator(this.latencyMs * 2, LATENCY_SMOOTHING_WEIGHT, this.now);
    this.timeRemaining = this.config.gameDurationMs / 1000;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  start(): void {
    if (this.frameIntervalId !== null) {
      return; // Already running
    }
    this.openSession();
    this.frameIntervalId = setInterval(() => {
      this.frame();
    }, this.frameIntervalMs);
  }

  stop(): void {
    if (this.frameIntervalId !== null) {
      clearInterval(this.frameIntervalId);
      this.frameIntervalId = null;
    }
    this.session?.close();
    this.session = null;
  }

  /**
   * Drop the current connection and all game state, then join again.
   */
  restart(): void {
    console.log("[GameClient] Restarting");
    this.session?.close();
    this.resetState();
    this.openSession();
  }

  isRunning(): boolean {
    return this.frameIntervalId !== null;
  }

  // ===========================================================================
  // Input
  // ===========================================================================

  /**
   * Replace the held directions. Takes effect locally on the next frame and
   * reaches the server with the next input message.
   */
  setDirections(directions: Iterable<Direction>): void {
    this.predictor.setDirections(directions);
  }

  // ===========================================================================
  // Frame loop
  // ===========================================================================

  /**
   * One local frame. Driven by the frame interval once started.
   */
  frame(): void {
    const now = this.now();
    const deltaMs = now - this.lastFrameTime;
    this.lastFrameTime = now;

    const session = this.session;
    if (!session) {
      return;
    }
    // Messages that arrived before the connection dropped still count
    for (const message of session.inbox.drainAll()) {
      this.handleMessage(message, now);
    }

    if (!session.isConnected()) {
      if (this.phase !== "disconnected") {
        console.log("[GameClient] Connection lost");
        this.phase = "disconnected";
      }
      return;
    }

    if (this.phase === "playing") {
      this.sendInputIfDue(session, now);
      this.predict(deltaMs);
    }
  }

  private sendInputIfDue(session: NetworkSession, now: number): void {
    if (now - this.lastInputTime < this.inputIntervalMs) {
      return;
    }
    this.lastInputTime = now;
    this.inputSequence++;

    const directions = this.predictor.getDirections();
    session.outbox.push(inputMessage(directions, this.inputSequence));
    if (directions.length > 0) {
      this.latency.onInputSent();
    }
  }

  private predict(deltaMs: number): void {
    const position = this.predictor.step(deltaMs);
    if (!position) {
      return;
    }
    for (const coinId of this.coins.predictPickups(position)) {
      console.log(`[GameClient] Predicted pickup of ${coinId}`);
    }
  }

  // ===========================================================================
  // Server messages
  // ===========================================================================

  private handleMessage(message: ServerMessage, now: number): void {
    switch (message.type) {
      case "welcome":
        this.localPlayerId = message.playerId;
        this.phase = "lobby";
        console.log(`[GameClient] Joined as ${message.playerId}`);
        break;
      case "lobby_update":
        this.lobby = {
          playerCount: message.playerCount,
          required: message.required,
          playerNames: message.playerNames,
        };
        break;
      case "game_start":
        this.countdown = message.countdown;
        break;
      case "game_state":
        this.applySnapshot(message.snapshot, now);
        break;
      case "coin_collected": {
        this.coins.confirmCollected(message.coinId);
        const collector = this.players.get(message.collectorId);
        if (collector) {
          collector.score = message.newScore;
        }
        if (message.collectorId === this.localPlayerId) {
          this.predictor.setScore(message.newScore);
          console.log(`[GameClient] Collected ${message.coinId}, score ${message.newScore}`);
        }
        break;
      }
      case "game_over":
        this.phase = "game_over";
        this.countdown = null;
        this.winnerName = message.winnerName;
        this.finalScores = { ...message.finalScores };
        console.log(`[GameClient] Game over, winner: ${message.winnerName ?? "nobody"}`);
        break;
    }
  }

  private applySnapshot(snapshot: GameSnapshot, now: number): void {
    this.latency.onSnapshot();

    if (snapshot.started && this.phase === "lobby") {
      this.phase = "playing";
      this.countdown = null;
      this.lastInputTime = now;
      console.log("[GameClient] Game started");
    }
    if (snapshot.over && this.phase === "playing") {
      this.phase = "game_over";
    }

    this.timeRemaining = snapshot.timeRemaining;
    this.serverTimeOffset = now - snapshot.serverTime;

    this.players.clear();
    const remoteIds = new Set<string>();
    for (const player of snapshot.players) {
      this.players.set(player.id, player);
      if (player.id === this.localPlayerId) {
        const result = this.predictor.reconcile(player);
        if (result.snapped && result.divergence > 0) {
          console.warn(
            `[GameClient] Prediction off by ${Math.round(result.divergence)} units, snapping to server`,
          );
        }
      } else {
        remoteIds.add(player.id);
        this.interpolation.addSample(player.id, snapshot.serverTime, player.position);
      }
    }
    this.interpolation.retainOnly(remoteIds);
    this.coins.applySnapshotCoins(snapshot.coins);
  }

  // ===========================================================================
  // Rendering
  // ===========================================================================

  getPhase(): ClientPhase {
    return this.phase;
  }

  getLocalPlayerId(): string | null {
    return this.localPlayerId;
  }

  getRenderView(): RenderView {
    const now = this.now();
    const renderTime =
      this.serverTimeOffset === null ? now : now - this.serverTimeOffset - this.interpolationDelayMs;

    const players = Array.from(this.players.values(), (player): RenderPlayer => {
      const isLocal = player.id === this.localPlayerId;
      const position = isLocal
        ? (this.predictor.getPosition() ?? player.position)
        : (this.interpolation.renderPosition(player.id, renderTime) ?? player.position);
      return Object.freeze({
        id: player.id,
        name: player.name,
        position: freezePosition(position),
        score: isLocal ? this.predictor.getScore() : player.score,
        colorIndex: player.colorIndex,
        isLocal,
      });
    });

    const coins = this.coins
      .visibleCoins()
      .map((coin) => Object.freeze({ id: coin.id, position: freezePosition(coin.position) }));

    const lobby: RenderLobby | null = this.lobby
      ? Object.freeze({
          playerCount: this.lobby.playerCount,
          required: this.lobby.required,
          playerNames: Object.freeze([...this.lobby.playerNames]),
        })
      : null;

    return Object.freeze({
      phase: this.phase,
      connected: this.session?.isConnected() ?? false,
      localPlayerId: this.localPlayerId,
      players: Object.freeze(players),
      coins: Object.freeze(coins),
      score: this.predictor.getScore(),
      timeRemaining: this.timeRemaining,
      lobby,
      countdown: this.countdown,
      latencyMs: this.latency.getEstimate(),
      winnerName: this.winnerName,
      finalScores: Object.freeze({ ...this.finalScores }),
    });
  }

  // ===========================================================================
  // Session
  // ===========================================================================

  private openSession(): void {
    const session = new NetworkSession({
      transport: this.connect(),
      playerName: this.playerName,
      latencyMs: this.latencyMs,
      pollIntervalMs: this.pollIntervalMs,
      now: this.now,
    });
    this.session = session;
    const now = this.now();
    this.lastFrameTime = now;
    this.lastInputTime = now;
    session.start();
  }

  private resetState(): void {
    this.predictor.reset();
    this.coins.clear();
    this.interpolation.clear();
    this.latency.reset();
    this.players.clear();
    this.phase = "connecting";
    this.localPlayerId = null;
    this.lobby = null;
    this.countdown = null;
    this.timeRemaining = this.config.gameDurationMs / 1000;
    this.winnerName = null;
    this.finalScores = {};
    this.serverTimeOffset = null;
    this.inputSequence = 0;
  }
}
