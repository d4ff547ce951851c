import { DEFAULT_HISTORY_CAPACITY, MAX_EXTRAPOLATION_MS } from "../constants.js";
import { cloneVec2, lerp } from "../core/math.js";
import { RingBuffer } from "../core/ring-buffer.js";
import type { Vector2 } from "../core/types.js";
import { getOrSet } from "../core/utils.js";

/**
 * One observed position of a remote entity, stamped with server time.
 */
export interface PositionSample {
  timestamp: number;
  position: Vector2;
}

/**
 * Configuration for {@link InterpolationBuffer}.
 */
export interface InterpolationConfig {
  /** Samples kept per entity (default: 20) */
  historyCapacity?: number;
  /** Maximum projection past the newest sample, same unit as timestamps (default: 200) */
  maxExtrapolation?: number;
}

/**
 * Bounded, time-ordered position history for one remote entity.
 *
 * Key concept: remote entities are rendered slightly "in the past" so two
 * samples bracketing the render time are usually buffered. When the feed
 * stalls, the entity keeps moving along its last known velocity for at most
 * `maxExtrapolation`, then holds.
 */
export class EntityHistory {
  private readonly samples: RingBuffer<PositionSample>;
  private readonly maxExtrapolation: number;

  constructor(
    capacity: number = DEFAULT_HISTORY_CAPACITY,
    maxExtrapolation: number = MAX_EXTRAPOLATION_MS,
  ) {
    this.samples = new RingBuffer<PositionSample>(capacity);
    this.maxExtrapolation = maxExtrapolation;
  }

  /**
   * Append a sample. Samples must arrive in timestamp order, which a FIFO
   * feed with uniform delay guarantees.
   */
  addSample(timestamp: number, position: Vector2): void {
    this.samples.push({ timestamp, position: cloneVec2(position) });
  }

  /**
   * Position to render at `renderTime`.
   *
   * - fewer than two samples: the latest one (undefined when empty)
   * - `renderTime` before every sample: the oldest sample
   * - `renderTime` after every sample: extrapolated from the last two samples,
   *   capped at `maxExtrapolation` past the newest
   * - otherwise: linear interpolation between the bracketing pair
   */
  positionAt(renderTime: number): Vector2 | undefined {
    if (this.samples.size < 2) {
      const latest = this.samples.newest();
      return latest ? cloneVec2(latest.position) : undefined;
    }

    let before: PositionSample | undefined;
    let after: PositionSample | undefined;
    for (const sample of this.samples) {
      if (sample.timestamp <= renderTime) {
        before = sample;
      } else {
        after = sample;
        break;
      }
    }

    if (!before) {
      // All samples are in the future - hold the oldest
      const oldest = this.samples.oldest();
      return oldest ? cloneVec2(oldest.position) : undefined;
    }

    if (!after) {
      return this.extrapolate(renderTime);
    }

    const span = after.timestamp - before.timestamp;
    if (span <= 0) {
      return cloneVec2(after.position);
    }
    const alpha = Math.max(0, Math.min(1, (renderTime - before.timestamp) / span));
    return lerp(before.position, after.position, alpha);
  }

  /**
   * Get the newest sample, if any.
   */
  latest(): PositionSample | undefined {
    return this.samples.newest();
  }

  size(): number {
    return this.samples.size;
  }

  clear(): void {
    this.samples.clear();
  }

  private extrapolate(renderTime: number): Vector2 | undefined {
    const previous = this.samples.at(-2);
    const newest = this.samples.at(-1);
    if (!previous || !newest) {
      return undefined;
    }

    const span = newest.timestamp - previous.timestamp;
    if (span <= 0) {
      return cloneVec2(newest.position);
    }

    const elapsed = Math.min(renderTime - newest.timestamp, this.maxExtrapolation);
    const factor = elapsed / span;
    return {
      x: newest.position.x + (newest.position.x - previous.position.x) * factor,
      y: newest.position.y + (newest.position.y - previous.position.y) * factor,
    };
  }
}

/**
 * Interpolation state for every remote entity.
 *
 * The local player is never added here; it is predicted instead.
 */
export class InterpolationBuffer {
  private readonly entities: Map<string, EntityHistory> = new Map();
  private readonly historyCapacity: number;
  private readonly maxExtrapolation: number;

  constructor(config: InterpolationConfig = {}) {
    this.historyCapacity = config.historyCapacity ?? DEFAULT_HISTORY_CAPACITY;
    this.maxExtrapolation = config.maxExtrapolation ?? MAX_EXTRAPOLATION_MS;
  }

  /**
   * Record an observed position, creating the entity on first observation.
   */
  addSample(entityId: string, timestamp: number, position: Vector2): void {
    getOrSet(
      this.entities,
      entityId,
      () => new EntityHistory(this.historyCapacity, this.maxExtrapolation),
    ).addSample(timestamp, position);
  }

  /**
   * Get the position to render for an entity, or undefined if it is unknown.
   */
  renderPosition(entityId: string, renderTime: number): Vector2 | undefined {
    return this.entities.get(entityId)?.positionAt(renderTime);
  }

  /**
   * Get render positions for every tracked entity.
   */
  renderPositions(renderTime: number): Map<string, Vector2> {
    const positions = new Map<string, Vector2>();
    for (const [entityId, history] of this.entities) {
      const position = history.positionAt(renderTime);
      if (position) {
        positions.set(entityId, position);
      }
    }
    return positions;
  }

  has(entityId: string): boolean {
    return this.entities.has(entityId);
  }

  /**
   * Stop tracking an entity (e.g. the player left).
   */
  remove(entityId: string): void {
    this.entities.delete(entityId);
  }

  /**
   * Remove every entity not in `liveIds`.
   * @returns ids that were removed
   */
  retainOnly(liveIds: ReadonlySet<string>): string[] {
    const removed: string[] = [];
    for (const entityId of this.entities.keys()) {
      if (!liveIds.has(entityId)) {
        removed.push(entityId);
      }
    }
    for (const entityId of removed) {
      this.entities.delete(entityId);
    }
    return removed;
  }

  entityIds(): string[] {
    return Array.from(this.entities.keys());
  }

  clear(): void {
    this.entities.clear();
  }
}
