/**
 * Client-side prediction for the local player.
 *
 * The local player moves immediately from held directions using the same
 * movement functions as the engine. Authoritative snapshots overwrite the
 * score every time but only move the player when the two positions have
 * drifted absurdly far apart: with the doubled round trip the predicted
 * position is expected to run permanently ahead of the server.
 */

import type { Bounds, Vector2 } from "@coinrush/netcode";
import { cloneVec2, distance } from "@coinrush/netcode";
import { DEFAULT_GAME_CONFIG, playerBounds } from "./constants.js";
import type { GameConfig } from "./constants.js";
import { stepPosition } from "./movement.js";
import type { CoinState, Direction, PlayerState } from "./types.js";

/**
 * Outcome of reconciling against one authoritative player state.
 */
export interface ReconcileResult {
  /** Distance between predicted and authoritative position before any correction */
  divergence: number;
  /** Whether the predicted position was replaced by the authoritative one */
  snapped: boolean;
}

export class LocalPlayerPredictor {
  private readonly config: GameConfig;
  private readonly bounds: Bounds;
  private position: Vector2 | null = null;
  private score = 0;
  private directions: Set<Direction> = new Set();

  constructor(config: GameConfig = DEFAULT_GAME_CONFIG) {
    this.config = config;
    this.bounds = playerBounds(config);
  }

  /**
   * Seed the prediction from the server, normally when the match starts.
   */
  initialize(position: Vector2, score = 0): void {
    this.position = cloneVec2(position);
    this.score = score;
  }

  isInitialized(): boolean {
    return this.position !== null;
  }

  setDirections(directions: Iterable<Direction>): void {
    this.directions = new Set(directions);
  }

  getDirections(): Direction[] {
    return Array.from(this.directions);
  }

  /**
   * Integrate one local frame.
   * @returns The predicted position, or undefined before initialization
   */
  step(deltaMs: number): Vector2 | undefined {
    if (!this.position) {
      return undefined;
    }
    this.position = stepPosition(
      this.position,
      this.directions,
      this.config.playerSpeed,
      deltaMs,
      this.bounds,
    );
    return cloneVec2(this.position);
  }

  /**
   * Apply an authoritative player state: score always, position only past
   * the snap distance.
   */
  reconcile(authoritative: PlayerState): ReconcileResult {
    this.score = authoritative.score;

    if (!this.position) {
      this.position = cloneVec2(authoritative.position);
      return { divergence: 0, snapped: true };
    }

    const divergence = distance(this.position, authoritative.position);
    if (divergence > this.config.reconcileSnapDistance) {
      this.position = cloneVec2(authoritative.position);
      return { divergence, snapped: true };
    }
    return { divergence, snapped: false };
  }

  /**
   * Score from a server pickup confirmation.
   */
  setScore(score: number): void {
    this.score = score;
  }

  getPosition(): Vector2 | undefined {
    return this.position ? cloneVec2(this.position) : undefined;
  }

  getScore(): number {
    return this.score;
  }

  reset(): void {
    this.position = null;
    this.score = 0;
    this.directions.clear();
  }
}

/**
 * Client view of the coins on the field.
 *
 * Tracks two sets besides the server's coin list:
 * - predicted: coins the local player appears to have touched. Hidden at
 *   once, but nothing else changes until the server confirms.
 * - confirmed: coins the server reported collected. A snapshot older than
 *   the confirmation may still list them; they stay hidden.
 */
export class CoinPrediction {
  private readonly pickupRadius: number;
  private readonly coins: Map<string, CoinState> = new Map();
  private readonly predicted: Set<string> = new Set();
  private readonly confirmed: Set<string> = new Set();

  constructor(pickupRadius: number = DEFAULT_GAME_CONFIG.pickupRadius) {
    this.pickupRadius = pickupRadius;
  }

  /**
   * Replace the known coins with a snapshot's list.
   *
   * Predictions and confirmations for coins the server no longer lists are
   * forgotten; coins already confirmed collected are never re-added.
   */
  applySnapshotCoins(coins: readonly CoinState[]): void {
    const serverIds = new Set(coins.map((coin) => coin.id));
    for (const id of this.predicted) {
      if (!serverIds.has(id)) this.predicted.delete(id);
    }
    for (const id of this.confirmed) {
      if (!serverIds.has(id)) this.confirmed.delete(id);
    }

    this.coins.clear();
    for (const coin of coins) {
      if (!this.confirmed.has(coin.id)) {
        this.coins.set(coin.id, { id: coin.id, position: cloneVec2(coin.position) });
      }
    }
  }

  /**
   * Server confirmed a pickup (by anyone).
   */
  confirmCollected(coinId: string): void {
    this.confirmed.add(coinId);
    this.coins.delete(coinId);
    this.predicted.delete(coinId);
  }

  /**
   * Mark every known coin within pickup radius of `position` as predicted.
   * @returns Ids newly predicted by this call
   */
  predictPickups(position: Vector2): string[] {
    const newlyPredicted: string[] = [];
    for (const coin of this.coins.values()) {
      if (this.predicted.has(coin.id)) continue;
      if (distance(position, coin.position) < this.pickupRadius) {
        this.predicted.add(coin.id);
        newlyPredicted.push(coin.id);
      }
    }
    return newlyPredicted;
  }

  /**
   * Coins to draw: known coins minus predicted pickups.
   */
  visibleCoins(): CoinState[] {
    const visible: CoinState[] = [];
    for (const coin of this.coins.values()) {
      if (!this.predicted.has(coin.id)) {
        visible.push({ id: coin.id, position: cloneVec2(coin.position) });
      }
    }
    return visible;
  }

  /**
   * Every coin the server still lists and has not confirmed collected,
   * including predicted ones.
   */
  knownCoinIds(): string[] {
    return Array.from(this.coins.keys());
  }

  isPredicted(coinId: string): boolean {
    return this.predicted.has(coinId);
  }

  isConfirmed(coinId: string): boolean {
    return this.confirmed.has(coinId);
  }

  clear(): void {
    this.coins.clear();
    this.predicted.clear();
    this.confirmed.clear();
  }
}
