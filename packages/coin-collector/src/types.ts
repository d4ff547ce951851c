/**
 * Coin collector game type definitions
 */

import type { Vector2 } from "@coinrush/netcode";

/**
 * Every movement direction a client may hold.
 */
export const DIRECTIONS = ["up", "down", "left", "right"] as const;

export type Direction = (typeof DIRECTIONS)[number];

/**
 * Player as seen by clients.
 */
export interface PlayerState {
  id: string;
  name: string;
  position: Vector2;
  score: number;
  /** Index into the player palette */
  colorIndex: number;
}

/**
 * Coin as seen by clients.
 */
export interface CoinState {
  id: string;
  position: Vector2;
}

/**
 * Full authoritative state at one instant. Always a deep copy of engine state.
 */
export interface GameSnapshot {
  /** When the snapshot was taken (ms since epoch) */
  timestamp: number;
  /** Server clock at the time of the snapshot (ms since epoch) */
  serverTime: number;
  players: PlayerState[];
  coins: CoinState[];
  /** Match time left in seconds */
  timeRemaining: number;
  started: boolean;
  over: boolean;
}

/**
 * A coin was picked up during an engine step.
 */
export interface CoinCollectedEvent {
  type: "coin_collected";
  coinId: string;
  collectorId: string;
  newScore: number;
}

/**
 * The match clock ran out. Emitted exactly once per match.
 */
export interface GameOverEvent {
  type: "game_over";
  /** Highest scorer, first joined on ties; null when nobody is left */
  winnerId: string | null;
  winnerName: string | null;
  /** Player id to final score */
  finalScores: Record<string, number>;
}

export type EngineEvent = CoinCollectedEvent | GameOverEvent;
