import type { Transport } from "../core/types.js";
import { TransportClosedError } from "./transport.js";

/**
 * One end of an in-process connection created by {@link createTransportPair}.
 *
 * Frames are handed to the other end synchronously. Used by tests and by
 * anything that wants to run client and server in one process without a
 * socket in between.
 */
export class MemoryTransport implements Transport {
  readonly id: string;
  /** Every frame this end has sent, in order */
  readonly sent: string[] = [];
  private peer: MemoryTransport | null = null;
  private closed = false;
  private readonly messageHandlers: Array<(text: string) => void> = [];
  private readonly closeHandlers: Array<() => void> = [];

  constructor(id: string) {
    this.id = id;
  }

  connect(peer: MemoryTransport): void {
    this.peer = peer;
  }

  send(text: string): void {
    if (this.closed) {
      throw new TransportClosedError(this.id);
    }
    this.sent.push(text);
    this.peer?.deliver(text);
  }

  isClosed(): boolean {
    return this.closed;
  }

  onMessage(handler: (text: string) => void): void {
    this.messageHandlers.push(handler);
  }

  onClose(handler: () => void): void {
    this.closeHandlers.push(handler);
  }

  /**
   * Close both ends of the connection.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const handler of this.closeHandlers) {
      handler();
    }
    this.peer?.close();
  }

  private deliver(text: string): void {
    if (this.closed) {
      return;
    }
    for (const handler of this.messageHandlers) {
      handler(text);
    }
  }
}

/**
 * Create two connected in-process transports.
 *
 * @example
 * ```ts
 * const [clientEnd, serverEnd] = createTransportPair("client-1");
 * server.connect(serverEnd);
 * clientEnd.send(encodeMessage(joinMessage("Ada")));
 * ```
 */
export function createTransportPair(id: string): [MemoryTransport, MemoryTransport] {
  const a = new MemoryTransport(id);
  const b = new MemoryTransport(id);
  a.connect(b);
  b.connect(a);
  return [a, b];
}
