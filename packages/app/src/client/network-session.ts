import {
  type Clock,
  DEFAULT_DELIVERY_POLL_INTERVAL_MS,
  DeliverySimulator,
  HandoffQueue,
  type Transport,
  requirePositive,
  sendIfOpen,
} from "@coinrush/netcode";
import {
  type ClientMessage,
  ProtocolError,
  type ServerMessage,
  decodeServerMessage,
  encodeMessage,
  joinMessage,
} from "@coinrush/coin-collector";

export interface NetworkSessionOptions {
  transport: Transport;
  playerName: string;
  /** One-way latency applied to every inbound and outbound frame */
  latencyMs?: number;
  pollIntervalMs?: number;
  now?: Clock;
}

/**
 * Network side of the client.
 *
 * Owns the transport and the delivery simulator. The frame loop never touches
 * either: it reads decoded server messages from `inbox` and leaves messages
 * for the server in `outbox`. Each poll moves the outbox into the delayed
 * outbound queue, then pumps both delayed queues.
 */
export class NetworkSession {
  readonly inbox = new HandoffQueue<ServerMessage>();
  readonly outbox = new HandoffQueue<ClientMessage>();
  private readonly transport: Transport;
  private readonly playerName: string;
  private readonly delivery: DeliverySimulator<string, string>;
  private readonly pollIntervalMs: number;
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private connected: boolean;

  constructor(options: NetworkSessionOptions) {
    this.transport = options.transport;
    this.playerName = options.playerName;
    this.connected = !this.transport.isClosed();
    this.pollIntervalMs = requirePositive(
      options.pollIntervalMs ?? DEFAULT_DELIVERY_POLL_INTERVAL_MS,
      "pollIntervalMs",
      "NetworkSession",
    );
    this.delivery = new DeliverySimulator<string, string>({
      latencyMs: options.latencyMs,
      pollIntervalMs: this.pollIntervalMs,
      now: options.now,
      deliverInbound: (text) => this.handleFrame(text),
      deliverOutbound: (text) => this.deliverFrame(text),
    });

    this.transport.onMessage((text) => {
      this.delivery.receive(text);
    });
    this.transport.onClose(() => {
      if (this.connected) {
        console.log("[NetworkSession] Disconnected from server");
      }
      this.connected = false;
    });
  }

  /**
   * Queue the join request and begin polling.
   */
  start(): void {
    if (this.intervalId !== null) {
      return; // Already running
    }
    this.delivery.send(encodeMessage(joinMessage(this.playerName)));
    this.intervalId = setInterval(() => {
      this.poll();
    }, this.pollIntervalMs);
  }

  /**
   * Move pending outbox messages into the delayed queue and deliver whatever is due.
   */
  poll(): void {
    for (const message of this.outbox.drainAll()) {
      this.delivery.send(encodeMessage(message));
    }
    this.delivery.pump();
  }

  /**
   * Stop polling, drop everything in flight and close the transport.
   */
  close(): void {
    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    this.delivery.clear();
    this.inbox.clear();
    this.outbox.clear();
    this.connected = false;
    this.transport.close();
  }

  isConnected(): boolean {
    return this.connected;
  }

  private handleFrame(text: string): void {
    let message: ServerMessage;
    try {
      message = decodeServerMessage(text);
    } catch (error) {
      if (error instanceof ProtocolError) {
        console.warn(`[NetworkSession] Dropping message from server: ${error.message}`);
        return;
      }
      throw error;
    }

    this.inbox.push(message);
  }

  private deliverFrame(text: string): void {
    if (!sendIfOpen(this.transport, text)) {
      this.connected = false;
    }
  }
}
