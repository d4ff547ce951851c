/**
 * Movement shared by the authoritative engine and the client predictor.
 *
 * Both sides must produce identical trajectories from the same direction set,
 * so neither integrates movement any other way.
 */

import type { Bounds, Vector2 } from "@coinrush/netcode";
import { add, clampToBounds, scale, vec2 } from "@coinrush/netcode";
import type { Direction } from "./types.js";

/**
 * Velocity for a set of held directions.
 *
 * Opposite directions cancel. A diagonal is normalized so its magnitude
 * equals `speed`, never `speed * sqrt(2)`.
 */
export function computeVelocity(directions: Iterable<Direction>, speed: number): Vector2 {
  const held = new Set(directions);
  const dx = (held.has("right") ? 1 : 0) - (held.has("left") ? 1 : 0);
  const dy = (held.has("down") ? 1 : 0) - (held.has("up") ? 1 : 0);

  if (dx !== 0 && dy !== 0) {
    return vec2(dx * speed * Math.SQRT1_2, dy * speed * Math.SQRT1_2);
  }
  return vec2(dx * speed, dy * speed);
}

/**
 * Advance a position by `velocity` over `deltaMs` and clamp it into `bounds`.
 */
export function integratePosition(
  position: Vector2,
  velocity: Vector2,
  deltaMs: number,
  bounds: Bounds,
): Vector2 {
  return clampToBounds(add(position, scale(velocity, deltaMs / 1000)), bounds);
}

/**
 * One movement step: velocity from directions, then integrate and clamp.
 */
export function stepPosition(
  position: Vector2,
  directions: Iterable<Direction>,
  speed: number,
  deltaMs: number,
  bounds: Bounds,
): Vector2 {
  return integratePosition(position, computeVelocity(directions, speed), deltaMs, bounds);
}
