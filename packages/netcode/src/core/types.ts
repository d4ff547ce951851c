/**
 * Core type definitions shared by every netcode primitive.
 *
 * @module core/types
 */

/**
 * 2D vector representing a position or velocity.
 */
export interface Vector2 {
  x: number;
  y: number;
}

/**
 * Axis-aligned rectangle used for world bounds.
 */
export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

/**
 * Source of the current time in milliseconds.
 *
 * Every time-driven primitive takes one of these so tests can drive time
 * explicitly instead of sleeping. Defaults to `Date.now`.
 */
export type Clock = () => number;

/**
 * A bidirectional, text-framed connection to one peer.
 *
 * The delivery layer only ever talks to a peer through this interface, so the
 * same server and client code runs over socket.io in production and over an
 * in-process pair in tests.
 */
export interface Transport {
  /** Stable identifier for this connection (socket id on socket.io) */
  readonly id: string;

  /**
   * Send one UTF-8 text frame.
   * @throws TransportClosedError when the connection is already closed
   */
  send(text: string): void;

  /** Whether the connection has been closed by either side */
  isClosed(): boolean;

  /** Register the handler for inbound text frames */
  onMessage(handler: (text: string) => void): void;

  /** Register the handler called once when the connection closes */
  onClose(handler: () => void): void;

  /** Close the connection from this side */
  close(): void;
}
