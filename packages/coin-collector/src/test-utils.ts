/**
 * Shared helpers for coin collector tests.
 */

import type { Vector2 } from "@coinrush/netcode";
import { SimulationEngine } from "./engine.js";
import type { SimulationEngineOptions } from "./engine.js";
import type { CoinState, GameSnapshot, PlayerState } from "./types.js";

/**
 * A clock tests move by hand.
 */
export interface ManualClock {
  now: () => number;
  set: (time: number) => void;
  advance: (ms: number) => void;
}

export function createManualClock(start = 0): ManualClock {
  let time = start;
  return {
    now: () => time,
    set: (value) => {
      time = value;
    },
    advance: (ms) => {
      time += ms;
    },
  };
}

/**
 * Id generator producing `${prefix}-1`, `${prefix}-2`, ...
 */
export function sequentialIds(prefix = "coin"): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

/**
 * Engine with a manual clock, sequential coin ids and random coin positions
 * pinned to the bottom-right corner, far from every spawn point.
 */
export function createTestEngine(
  options: SimulationEngineOptions = {},
): { engine: SimulationEngine; clock: ManualClock } {
  const clock = createManualClock(1_000);
  const engine = new SimulationEngine({
    now: clock.now,
    random: () => 0.99,
    createId: sequentialIds(),
    ...options,
  });
  return { engine, clock };
}

export function createTestPlayer(overrides: Partial<PlayerState> = {}): PlayerState {
  return {
    id: "player-1",
    name: "Ada",
    position: { x: 200, y: 150 },
    score: 0,
    colorIndex: 0,
    ...overrides,
  };
}

export function createTestCoin(id: string, position: Vector2): CoinState {
  return { id, position };
}

export function createTestSnapshot(overrides: Partial<GameSnapshot> = {}): GameSnapshot {
  return {
    timestamp: 10_000,
    serverTime: 10_000,
    players: [],
    coins: [],
    timeRemaining: 120,
    started: true,
    over: false,
    ...overrides,
  };
}
