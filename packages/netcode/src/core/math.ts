/**
 * Vector math for 2D positions.
 *
 * All functions are pure - they return new values without mutating inputs.
 * Uses the screen coordinate system (Y grows downward).
 */

import type { Bounds, Vector2 } from "./types.js";

/**
 * Create a new Vector2.
 */
export const vec2 = (x: number, y: number): Vector2 => ({ x, y });

/** Zero vector (0, 0) */
export const vec2Zero: Vector2 = Object.freeze({ x: 0, y: 0 });

/**
 * Copy a vector so the result shares no state with the input.
 */
export const cloneVec2 = (v: Vector2): Vector2 => ({ x: v.x, y: v.y });

export const add = (a: Vector2, b: Vector2): Vector2 => ({
  x: a.x + b.x,
  y: a.y + b.y,
});

export const sub = (a: Vector2, b: Vector2): Vector2 => ({
  x: a.x - b.x,
  y: a.y - b.y,
});

export const scale = (v: Vector2, s: number): Vector2 => ({
  x: v.x * s,
  y: v.y * s,
});

/**
 * Magnitude (length) of a vector.
 */
export const magnitude = (v: Vector2): number => Math.sqrt(v.x * v.x + v.y * v.y);

/**
 * Euclidean distance between two points.
 */
export const distance = (a: Vector2, b: Vector2): number => magnitude(sub(a, b));

/**
 * Normalize a vector to unit length.
 * Returns the zero vector if the input has zero length.
 */
export const normalize = (v: Vector2): Vector2 => {
  const mag = magnitude(v);
  return mag > 0 ? scale(v, 1 / mag) : cloneVec2(vec2Zero);
};

/**
 * Clamp a number to [min, max].
 */
export const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));

/**
 * Linear interpolation between two points.
 * t = 0 returns `a`, t = 1 returns `b`.
 */
export const lerp = (a: Vector2, b: Vector2, t: number): Vector2 => ({
  x: a.x + (b.x - a.x) * t,
  y: a.y + (b.y - a.y) * t,
});

/**
 * Clamp a point into a rectangle.
 */
export const clampToBounds = (v: Vector2, bounds: Bounds): Vector2 => ({
  x: clamp(v.x, bounds.minX, bounds.maxX),
  y: clamp(v.y, bounds.minY, bounds.maxY),
});

/**
 * Shrink a `width` x `height` world by `inset` on every side.
 * Used to keep an entity's whole footprint inside the world.
 */
export const insetBounds = (width: number, height: number, inset: number): Bounds => ({
  minX: inset,
  minY: inset,
  maxX: width - inset,
  maxY: height - inset,
});
