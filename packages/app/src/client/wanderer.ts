import { getAt } from "@coinrush/netcode";
import type { Direction } from "@coinrush/coin-collector";

const MOVES: ReadonlyArray<readonly Direction[]> = [
  [],
  ["up"],
  ["down"],
  ["left"],
  ["right"],
  ["up", "left"],
  ["up", "right"],
  ["down", "left"],
  ["down", "right"],
];

/**
 * Picks a new held direction set every so often. Drives the headless client
 * in place of a keyboard.
 */
export class Wanderer {
  private readonly random: () => number;
  private readonly minHoldMs: number;
  private readonly maxHoldMs: number;
  private current: readonly Direction[] = [];
  private changeAt = 0;

  constructor(random: () => number = Math.random, minHoldMs = 500, maxHoldMs = 1500) {
    this.random = random;
    this.minHoldMs = minHoldMs;
    this.maxHoldMs = maxHoldMs;
  }

  next(now: number): Direction[] {
    if (now >= this.changeAt) {
      this.current = getAt(MOVES, Math.floor(this.random() * MOVES.length), "moves");
      this.changeAt = now + this.minHoldMs + this.random() * (this.maxHoldMs - this.minHoldMs);
    }
    return [...this.current];
  }
}
