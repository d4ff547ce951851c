/**
 * Authoritative coin collector simulation.
 *
 * The engine never touches the network. Callers feed it inputs, advance it by
 * a delta, and receive the events the step produced; snapshots are exported
 * on demand so the tick rate and the broadcast rate stay independent.
 */

import { randomUUID } from "node:crypto";
import type { Bounds, Clock, Vector2 } from "@coinrush/netcode";
import { cloneVec2, distance, getAt } from "@coinrush/netcode";
import {
  DEFAULT_GAME_CONFIG,
  PLAYER_COLORS,
  coinSpawnBounds,
  playerBounds,
  spawnPoints,
} from "./constants.js";
import type { GameConfig } from "./constants.js";
import { stepPosition } from "./movement.js";
import type {
  CoinState,
  Direction,
  EngineEvent,
  GameOverEvent,
  GameSnapshot,
  PlayerState,
} from "./types.js";

/**
 * Server-side player record. Only the engine mutates it.
 */
interface Player {
  id: string;
  name: string;
  position: Vector2;
  score: number;
  colorIndex: number;
  directions: Set<Direction>;
  /** Highest input sequence accepted so far; 0 before any input */
  lastInputSequence: number;
}

interface Coin {
  id: string;
  position: Vector2;
  spawnTime: number;
}

export interface SimulationEngineOptions {
  /** Overrides merged onto {@link DEFAULT_GAME_CONFIG} */
  config?: Partial<GameConfig>;
  /** Time source (default: Date.now) */
  now?: Clock;
  /** Uniform random source in [0, 1) used for coin placement (default: Math.random) */
  random?: () => number;
  /** Coin id generator (default: first 8 characters of a random UUID) */
  createId?: () => string;
}

const defaultCreateId = (): string => randomUUID().slice(0, 8);

const toPlayerState = (player: Player): PlayerState => ({
  id: player.id,
  name: player.name,
  position: cloneVec2(player.position),
  score: player.score,
  colorIndex: player.colorIndex,
});

const toCoinState = (coin: Coin): CoinState => ({
  id: coin.id,
  position: cloneVec2(coin.position),
});

export class SimulationEngine {
  readonly config: GameConfig;
  private readonly now: Clock;
  private readonly random: () => number;
  private readonly createId: () => string;
  private readonly bounds: Bounds;
  private readonly coinBounds: Bounds;
  private readonly spawns: Vector2[];

  // Maps keep insertion order, which decides pickup ties and winner ties
  private readonly players: Map<string, Player> = new Map();
  private readonly coins: Map<string, Coin> = new Map();

  private started = false;
  private over = false;
  private startTime = 0;
  private lastCoinSpawn = 0;
  private nextColorIndex = 0;

  constructor(options: SimulationEngineOptions = {}) {
    this.config = { ...DEFAULT_GAME_CONFIG, ...options.config };
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
    this.createId = options.createId ?? defaultCreateId;
    this.bounds = playerBounds(this.config);
    this.coinBounds = coinSpawnBounds(this.config);
    this.spawns = spawnPoints(this.config);
  }

  // ===========================================================================
  // Membership
  // ===========================================================================

  /**
   * Add a player at the next spawn point with the next palette color.
   * Adding an id that is already present changes nothing.
   */
  addPlayer(id: string, name: string): PlayerState {
    const existing = this.players.get(id);
    if (existing) {
      return toPlayerState(existing);
    }

    const spawn = getAt(this.spawns, this.players.size % this.spawns.length, "spawn points");
    const player: Player = {
      id,
      name,
      position: cloneVec2(spawn),
      score: 0,
      colorIndex: this.nextColorIndex % PLAYER_COLORS.length,
      directions: new Set(),
      lastInputSequence: 0,
    };
    this.nextColorIndex++;
    this.players.set(id, player);
    return toPlayerState(player);
  }

  removePlayer(id: string): PlayerState | undefined {
    const player = this.players.get(id);
    if (!player) {
      return undefined;
    }
    this.players.delete(id);
    return toPlayerState(player);
  }

  getPlayer(id: string): PlayerState | undefined {
    const player = this.players.get(id);
    return player ? toPlayerState(player) : undefined;
  }

  getPlayers(): PlayerState[] {
    return Array.from(this.players.values(), toPlayerState);
  }

  get playerCount(): number {
    return this.players.size;
  }

  canStart(minPlayers: number = this.config.minPlayers): boolean {
    return this.players.size >= minPlayers;
  }

  // ===========================================================================
  // Input
  // ===========================================================================

  /**
   * Replace a player's held directions.
   *
   * Dropped unless the match is running, the player exists and `sequence` is
   * newer than every sequence accepted before, so duplicated or reordered
   * inputs never change state.
   *
   * @returns Whether the input was applied
   */
  submitInput(id: string, directions: Iterable<Direction>, sequence: number): boolean {
    const player = this.players.get(id);
    if (!player || !this.started || this.over) {
      return false;
    }
    if (sequence <= player.lastInputSequence) {
      return false;
    }
    player.lastInputSequence = sequence;
    player.directions = new Set(directions);
    return true;
  }

  /**
   * Directions and last accepted sequence for a player, for inspection.
   */
  getInputState(id: string): { directions: Direction[]; lastInputSequence: number } | undefined {
    const player = this.players.get(id);
    if (!player) {
      return undefined;
    }
    return { directions: Array.from(player.directions), lastInputSequence: player.lastInputSequence };
  }

  // ===========================================================================
  // Simulation
  // ===========================================================================

  /**
   * Advance the match by `deltaMs`.
   *
   * Order within a step: movement, coin pickups, coin spawning, match clock.
   * Does nothing before the match starts or after it ends.
   */
  advance(deltaMs: number): EngineEvent[] {
    if (!this.started || this.over) {
      return [];
    }

    const now = this.now();
    const events: EngineEvent[] = [];

    for (const player of this.players.values()) {
      player.position = stepPosition(
        player.position,
        player.directions,
        this.config.playerSpeed,
        deltaMs,
        this.bounds,
      );
    }

    // Scoped to this step only
    const collected = new Set<string>();
    for (const coin of this.coins.values()) {
      if (collected.has(coin.id)) continue;

      for (const player of this.players.values()) {
        if (distance(player.position, coin.position) < this.config.pickupRadius) {
          player.score += 1;
          collected.add(coin.id);
          events.push({
            type: "coin_collected",
            coinId: coin.id,
            collectorId: player.id,
            newScore: player.score,
          });
          break;
        }
      }
    }
    for (const coinId of collected) {
      this.coins.delete(coinId);
    }

    if (now - this.lastCoinSpawn >= this.config.coinSpawnIntervalMs) {
      if (this.coins.size < this.config.maxCoins) {
        this.spawnCoin();
      }
      this.lastCoinSpawn = now;
    }

    if (now - this.startTime >= this.config.gameDurationMs) {
      this.over = true;
      events.push(this.gameOverEvent());
    }

    return events;
  }

  /**
   * Place a coin, at a uniformly random spot inset by one coin diameter when
   * no position is given.
   */
  spawnCoin(position?: Vector2): CoinState {
    let id = this.createId();
    while (this.coins.has(id)) {
      id = this.createId();
    }

    const coin: Coin = {
      id,
      position: position ? cloneVec2(position) : this.randomCoinPosition(),
      spawnTime: this.now(),
    };
    this.coins.set(id, coin);
    return toCoinState(coin);
  }

  // ===========================================================================
  // Match lifecycle
  // ===========================================================================

  /**
   * Start the match clock and place the initial coins. No-op once started.
   */
  startGame(): void {
    if (this.started) {
      return;
    }
    const now = this.now();
    this.started = true;
    this.over = false;
    this.startTime = now;
    this.lastCoinSpawn = now;
    for (let i = 0; i < this.config.initialCoins; i++) {
      this.spawnCoin();
    }
  }

  /**
   * Back to an empty pre-game lobby.
   */
  reset(): void {
    this.players.clear();
    this.coins.clear();
    this.started = false;
    this.over = false;
    this.startTime = 0;
    this.lastCoinSpawn = 0;
    this.nextColorIndex = 0;
  }

  isStarted(): boolean {
    return this.started;
  }

  isOver(): boolean {
    return this.over;
  }

  /**
   * Match time left in milliseconds; the full duration before the start.
   */
  getTimeRemaining(): number {
    if (!this.started) {
      return this.config.gameDurationMs;
    }
    return Math.max(0, this.config.gameDurationMs - (this.now() - this.startTime));
  }

  /**
   * Highest scorer; the earliest joined player wins a tie.
   */
  getWinner(): PlayerState | undefined {
    let winner: Player | undefined;
    for (const player of this.players.values()) {
      if (!winner || player.score > winner.score) {
        winner = player;
      }
    }
    return winner ? toPlayerState(winner) : undefined;
  }

  getCoins(): CoinState[] {
    return Array.from(this.coins.values(), toCoinState);
  }

  /**
   * Deep copy of the full state. Nothing in it aliases engine state.
   */
  snapshot(): GameSnapshot {
    const now = this.now();
    return {
      timestamp: now,
      serverTime: now,
      players: this.getPlayers(),
      coins: this.getCoins(),
      timeRemaining: this.getTimeRemaining() / 1000,
      started: this.started,
      over: this.over,
    };
  }

  private gameOverEvent(): GameOverEvent {
    const winner = this.getWinner();
    const finalScores: Record<string, number> = {};
    for (const player of this.players.values()) {
      finalScores[player.id] = player.score;
    }
    return {
      type: "game_over",
      winnerId: winner?.id ?? null,
      winnerName: winner?.name ?? null,
      finalScores,
    };
  }

  private randomCoinPosition(): Vector2 {
    const { minX, minY, maxX, maxY } = this.coinBounds;
    return {
      x: minX + this.random() * (maxX - minX),
      y: minY + this.random() * (maxY - minY),
    };
  }
}
