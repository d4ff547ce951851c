/**
 * Single-producer/single-consumer hand-off between the network session and
 * the frame loop.
 *
 * The two sides never share any other state: the network side pushes decoded
 * messages into an inbox, the frame side pushes outgoing messages into an
 * outbox, and each side drains the queue it consumes once per step.
 */
export class HandoffQueue<T> {
  private items: T[] = [];

  push(item: T): void {
    this.items.push(item);
  }

  /**
   * Take every queued item in push order, leaving the queue empty.
   */
  drainAll(): T[] {
    if (this.items.length === 0) {
      return [];
    }
    const drained = this.items;
    this.items = [];
    return drained;
  }

  size(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
  }
}
