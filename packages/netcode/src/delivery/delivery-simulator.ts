/**
 * Bidirectional latency injection used identically by client and server.
 *
 * Every inbound and outbound message sits in a {@link DelayQueue} for the
 * configured one-way latency before it is handed on. A single polling
 * interval drains both queues, so delivery never blocks the caller and a
 * drain is always atomic with respect to the other tasks on the event loop.
 *
 * @module delivery/delivery-simulator
 */

import { DEFAULT_DELIVERY_POLL_INTERVAL_MS, DEFAULT_SIMULATED_LATENCY_MS } from "../constants.js";
import type { Clock } from "../core/types.js";
import { requirePositive } from "../core/utils.js";
import { DelayQueue } from "./delay-queue.js";

/**
 * Configuration for a delivery simulator.
 *
 * @typeParam TIn - Payload type of inbound (received) messages
 * @typeParam TOut - Payload type of outbound (sent) messages
 */
export interface DeliverySimulatorConfig<TIn, TOut> {
  /** One-way latency applied to each leg in milliseconds (default: 200) */
  latencyMs?: number;
  /** How often both queues are polled in milliseconds (default: 5) */
  pollIntervalMs?: number;
  /** Called for each inbound payload once it is due */
  deliverInbound: (payload: TIn) => void;
  /** Called for each outbound payload once it is due */
  deliverOutbound: (payload: TOut) => void;
  /** Time source (default: Date.now) */
  now?: Clock;
}

/**
 * Result of one pump of both queues.
 */
export interface PumpResult {
  inbound: number;
  outbound: number;
}

/**
 * A pair of delayed queues, one per direction, drained on a short interval.
 *
 * @example
 * ```ts
 * const delivery = new DeliverySimulator<string, string>({
 *   latencyMs: 200,
 *   deliverInbound: (text) => handleMessage(text),
 *   deliverOutbound: (text) => sendIfOpen(transport, text),
 * });
 * transport.onMessage((text) => delivery.receive(text));
 * delivery.start();
 * delivery.send(encodeMessage(joinMessage("Ada")));
 * ```
 */
export class DeliverySimulator<TIn, TOut> {
  private readonly inbound: DelayQueue<TIn>;
  private readonly outbound: DelayQueue<TOut>;
  private readonly deliverInbound: (payload: TIn) => void;
  private readonly deliverOutbound: (payload: TOut) => void;
  private readonly pollIntervalMs: number;
  private intervalId: ReturnType<typeof setInterval> | null = null;

  constructor(config: DeliverySimulatorConfig<TIn, TOut>) {
    const latencyMs = config.latencyMs ?? DEFAULT_SIMULATED_LATENCY_MS;
    const now = config.now ?? Date.now;
    this.inbound = new DelayQueue<TIn>(latencyMs, now);
    this.outbound = new DelayQueue<TOut>(latencyMs, now);
    this.deliverInbound = config.deliverInbound;
    this.deliverOutbound = config.deliverOutbound;
    this.pollIntervalMs = requirePositive(
      config.pollIntervalMs ?? DEFAULT_DELIVERY_POLL_INTERVAL_MS,
      "pollIntervalMs",
      "DeliverySimulator",
    );
  }

  /**
   * Queue a message that just arrived from the peer.
   */
  receive(payload: TIn): void {
    this.inbound.enqueue(payload);
  }

  /**
   * Queue a message for the peer.
   */
  send(payload: TOut): void {
    this.outbound.enqueue(payload);
  }

  /**
   * Deliver everything that is due: inbound first, then outbound.
   */
  pump(): PumpResult {
    const inbound = this.inbound.drain(this.deliverInbound);
    const outbound = this.outbound.drain(this.deliverOutbound);
    return { inbound, outbound };
  }

  /**
   * Start polling both queues.
   */
  start(): void {
    if (this.intervalId !== null) {
      return; // Already running
    }
    this.intervalId = setInterval(() => {
      this.pump();
    }, this.pollIntervalMs);
  }

  /**
   * Stop polling. Pending messages stay queued until `clear()` or the next start.
   */
  stop(): void {
    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  isRunning(): boolean {
    return this.intervalId !== null;
  }

  /**
   * Drop every pending message in both directions.
   */
  clear(): void {
    this.inbound.clear();
    this.outbound.clear();
  }

  getLatency(): number {
    return this.inbound.getLatency();
  }
}
