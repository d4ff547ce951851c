import type { Transport } from "../core/types.js";

/**
 * Socket.IO event that carries one text frame in either direction.
 */
export const MESSAGE_EVENT = "message";

/**
 * Socket.IO event map for text-framed transports (both directions).
 */
export interface TextFrameEvents {
  message: (text: string) => void;
}

/**
 * Thrown by {@link Transport.send} once the connection is closed.
 */
export class TransportClosedError extends Error {
  readonly transportId: string;

  constructor(transportId: string) {
    super(`Transport ${transportId} is closed`);
    this.name = "TransportClosedError";
    this.transportId = transportId;
  }
}

/**
 * Send a frame unless the transport is closed.
 *
 * A frame addressed to a closed peer is dropped, never retried: whoever owns
 * the transport learns about the closure through `onClose` and reacts there.
 *
 * @returns Whether the frame was handed to the transport
 */
export function sendIfOpen(transport: Transport, text: string): boolean {
  if (transport.isClosed()) {
    return false;
  }
  try {
    transport.send(text);
    return true;
  } catch (error) {
    if (error instanceof TransportClosedError) {
      return false;
    }
    throw error;
  }
}
