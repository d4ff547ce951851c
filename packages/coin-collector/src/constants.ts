/**
 * Coin collector game constants.
 *
 * Shared by the authoritative engine and the client predictor so both sides
 * integrate movement with identical numbers. Times are milliseconds, speeds
 * are world units per second.
 */

import type { Bounds, Vector2 } from "@coinrush/netcode";
import { insetBounds } from "@coinrush/netcode";

export interface GameConfig {
  // --- World ---
  worldWidth: number;
  worldHeight: number;

  // --- Players ---
  /** Diameter of a player circle */
  playerSize: number;
  /** Speed along one axis; diagonals are normalized to the same magnitude */
  playerSpeed: number;

  // --- Coins ---
  /** Diameter of a coin */
  coinSize: number;
  /** Center-to-center distance below which a player collects a coin */
  pickupRadius: number;
  coinSpawnIntervalMs: number;
  maxCoins: number;
  /** Coins placed when the match starts */
  initialCoins: number;

  // --- Lobby ---
  minPlayers: number;
  maxPlayers: number;
  countdownSeconds: number;

  // --- Match ---
  gameDurationMs: number;
  /** Simulation ticks per second */
  serverTickRate: number;
  /** Snapshot broadcasts per second */
  broadcastRate: number;
  /** Client input messages per second */
  clientInputRate: number;
  /**
   * Divergence between predicted and authoritative position above which the
   * client snaps to the server. Tuned against the doubled round trip of the
   * delivery simulator (about 800 ms of travel at 200 units/s is 160 units).
   */
  reconcileSnapDistance: number;
}

export const DEFAULT_GAME_CONFIG: GameConfig = {
  worldWidth: 800,
  worldHeight: 600,

  playerSize: 30,
  playerSpeed: 200,

  coinSize: 20,
  pickupRadius: (30 + 20) / 2,
  coinSpawnIntervalMs: 3000,
  maxCoins: 10,
  initialCoins: 3,

  minPlayers: 2,
  maxPlayers: 4,
  countdownSeconds: 3,

  gameDurationMs: 120_000,
  serverTickRate: 60,
  broadcastRate: 20,
  clientInputRate: 30,
  reconcileSnapDistance: 200,
};

/**
 * Player palette, indexed by `colorIndex`. Royal blue, crimson, lime green, orange.
 */
export const PLAYER_COLORS = ["#4169e1", "#dc143c", "#32cd32", "#ffa500"] as const;

/**
 * Spawn points at the four quarter points of the world, used in join order.
 */
export function spawnPoints(config: GameConfig = DEFAULT_GAME_CONFIG): Vector2[] {
  const { worldWidth: w, worldHeight: h } = config;
  return [
    { x: w * 0.25, y: h * 0.25 },
    { x: w * 0.75, y: h * 0.25 },
    { x: w * 0.25, y: h * 0.75 },
    { x: w * 0.75, y: h * 0.75 },
  ];
}

/**
 * Area a player's center may occupy: the world shrunk by half a player.
 */
export function playerBounds(config: GameConfig = DEFAULT_GAME_CONFIG): Bounds {
  return insetBounds(config.worldWidth, config.worldHeight, config.playerSize / 2);
}

/**
 * Area new coins are placed in: the world shrunk by one coin diameter.
 */
export function coinSpawnBounds(config: GameConfig = DEFAULT_GAME_CONFIG): Bounds {
  return insetBounds(config.worldWidth, config.worldHeight, config.coinSize);
}
