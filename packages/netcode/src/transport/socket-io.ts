/**
 * {@link Transport} adapters over Socket.IO sockets.
 *
 * Frames travel as the single string argument of the `message` event.
 * Anything else arriving on that event is logged and dropped.
 *
 * @module transport/socket-io
 */

import type { Socket as ServerSocket } from "socket.io";
import type { Socket as ClientSocket } from "socket.io-client";
import type { Transport } from "../core/types.js";
import { MESSAGE_EVENT, type TextFrameEvents, TransportClosedError } from "./transport.js";

export type TextFrameServerSocket = ServerSocket<TextFrameEvents, TextFrameEvents>;
export type TextFrameClientSocket = ClientSocket<TextFrameEvents, TextFrameEvents>;

/**
 * Server-side end of a connection (one per connected client).
 */
export class SocketIoServerTransport implements Transport {
  private readonly socket: TextFrameServerSocket;

  constructor(socket: TextFrameServerSocket) {
    this.socket = socket;
  }

  get id(): string {
    return this.socket.id;
  }

  send(text: string): void {
    if (this.isClosed()) {
      throw new TransportClosedError(this.id);
    }
    this.socket.emit(MESSAGE_EVENT, text);
  }

  isClosed(): boolean {
    return this.socket.disconnected;
  }

  onMessage(handler: (text: string) => void): void {
    this.socket.on(MESSAGE_EVENT, (text: unknown) => {
      if (typeof text !== "string") {
        console.warn(`[SocketIoServerTransport] Dropping non-text frame from ${this.id}`);
        return;
      }
      handler(text);
    });
  }

  onClose(handler: () => void): void {
    this.socket.on("disconnect", () => handler());
  }

  close(): void {
    this.socket.disconnect(true);
  }
}

/**
 * Client-side end of the connection to the game server.
 *
 * Create the socket with `reconnection: false`: a dropped connection is
 * surfaced as closed and the client decides whether to start a new session.
 */
export class SocketIoClientTransport implements Transport {
  private readonly socket: TextFrameClientSocket;
  private closed = false;
  private readonly closeHandlers: Array<() => void> = [];

  constructor(socket: TextFrameClientSocket) {
    this.socket = socket;
    this.socket.on("disconnect", () => this.markClosed());
    this.socket.on("connect_error", (error) => {
      console.warn(`[SocketIoClientTransport] Connection failed: ${error.message}`);
      this.markClosed();
    });
  }

  get id(): string {
    return this.socket.id ?? "pending";
  }

  send(text: string): void {
    if (this.closed) {
      throw new TransportClosedError(this.id);
    }
    this.socket.emit(MESSAGE_EVENT, text);
  }

  isClosed(): boolean {
    return this.closed;
  }

  onMessage(handler: (text: string) => void): void {
    this.socket.on(MESSAGE_EVENT, (text: unknown) => {
      if (typeof text !== "string") {
        console.warn("[SocketIoClientTransport] Dropping non-text frame from server");
        return;
      }
      handler(text);
    });
  }

  onClose(handler: () => void): void {
    if (this.closed) {
      handler();
      return;
    }
    this.closeHandlers.push(handler);
  }

  close(): void {
    this.socket.disconnect();
    this.markClosed();
  }

  private markClosed(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const handler of this.closeHandlers) {
      handler();
    }
  }
}
