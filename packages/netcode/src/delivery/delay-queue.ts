import type { Clock } from "../core/types.js";

/**
 * A payload waiting to be delivered.
 */
export interface DelayedEnvelope<T> {
  payload: T;
  /** Clock time at or after which the payload may be delivered */
  deliverAt: number;
}

/**
 * FIFO queue that holds every payload for a fixed latency.
 *
 * All envelopes in one queue carry the same delay, so enqueue order equals
 * delivery order and `drain` only ever has to look at the front. Nothing is
 * scheduled per message; the owner polls `drain` on a short interval.
 *
 * @example
 * ```ts
 * const queue = new DelayQueue<string>(200);
 * queue.enqueue("hello");
 * // ...200ms later
 * queue.drain((text) => socket.send(text));
 * ```
 */
export class DelayQueue<T> {
  private entries: DelayedEnvelope<T>[] = [];
  /** Index of the front entry; consumed slots are compacted lazily */
  private head = 0;
  private readonly latencyMs: number;
  private readonly now: Clock;

  constructor(latencyMs: number, now: Clock = Date.now) {
    if (!Number.isFinite(latencyMs) || latencyMs < 0) {
      throw new Error(`DelayQueue latency must be a non-negative number. Got: ${latencyMs}`);
    }
    this.latencyMs = latencyMs;
    this.now = now;
  }

  /**
   * Stamp the payload with `now + latency` and append it.
   */
  enqueue(payload: T): void {
    this.entries.push({ payload, deliverAt: this.now() + this.latencyMs });
  }

  /**
   * Deliver every payload that is due, in enqueue order.
   * Stops at the first entry that is not yet due.
   *
   * @returns Number of payloads delivered
   */
  drain(deliver: (payload: T) => void): number {
    const now = this.now();
    let delivered = 0;

    while (this.head < this.entries.length) {
      const envelope = this.entries[this.head];
      if (envelope === undefined || envelope.deliverAt > now) {
        break;
      }
      this.head++;
      delivered++;
      deliver(envelope.payload);
    }

    this.compact();
    return delivered;
  }

  /**
   * Get the delivery time of the front entry, if any.
   */
  peekDeliverAt(): number | undefined {
    return this.entries[this.head]?.deliverAt;
  }

  /**
   * Get number of payloads still waiting.
   */
  size(): number {
    return this.entries.length - this.head;
  }

  /**
   * Drop all pending payloads.
   */
  clear(): void {
    this.entries = [];
    this.head = 0;
  }

  getLatency(): number {
    return this.latencyMs;
  }

  private compact(): void {
    if (this.head === this.entries.length) {
      this.entries = [];
      this.head = 0;
    } else if (this.head > 64 && this.head * 2 > this.entries.length) {
      this.entries = this.entries.slice(this.head);
      this.head = 0;
    }
  }
}
