/**
 * @coinrush/netcode - State synchronisation primitives for server-authoritative games
 *
 * Provides the game-agnostic pieces both endpoints share:
 * - Latency injection with FIFO delayed queues drained on a short poll
 * - Hand-off queues between the network session and the frame loop
 * - Remote-entity interpolation with bounded extrapolation
 * - A text-framed transport abstraction over Socket.IO
 */

// =============================================================================
// Core Types
// =============================================================================
export type { Bounds, Clock, Transport, Vector2 } from "./core/types.js";

export {
  vec2,
  vec2Zero,
  cloneVec2,
  add,
  sub,
  scale,
  magnitude,
  distance,
  normalize,
  clamp,
  lerp,
  clampToBounds,
  insetBounds,
} from "./core/math.js";

export { RingBuffer } from "./core/ring-buffer.js";
export { getAt, getOrSet, requirePositive } from "./core/utils.js";

// =============================================================================
// Delivery
// =============================================================================
export { DelayQueue } from "./delivery/delay-queue.js";
export type { DelayedEnvelope } from "./delivery/delay-queue.js";
export { DeliverySimulator } from "./delivery/delivery-simulator.js";
export type { DeliverySimulatorConfig, PumpResult } from "./delivery/delivery-simulator.js";
export { HandoffQueue } from "./delivery/handoff-queue.js";

// =============================================================================
// Client Primitives
// =============================================================================
export { EntityHistory, InterpolationBuffer } from "./client/interpolation.js";
export type { InterpolationConfig, PositionSample } from "./client/interpolation.js";
export { LatencyEstimator } from "./client/latency-estimator.js";

// =============================================================================
// Transport
// =============================================================================
export { MESSAGE_EVENT, TransportClosedError, sendIfOpen } from "./transport/transport.js";
export type { TextFrameEvents } from "./transport/transport.js";
export { SocketIoServerTransport, SocketIoClientTransport } from "./transport/socket-io.js";
export type { TextFrameServerSocket, TextFrameClientSocket } from "./transport/socket-io.js";
export { MemoryTransport, createTransportPair } from "./transport/memory.js";

// =============================================================================
// Constants
// =============================================================================
export {
  DEFAULT_SIMULATED_LATENCY_MS,
  DEFAULT_DELIVERY_POLL_INTERVAL_MS,
  DEFAULT_INTERPOLATION_DELAY_MS,
  MAX_EXTRAPOLATION_MS,
  DEFAULT_HISTORY_CAPACITY,
  LATENCY_SMOOTHING_WEIGHT,
} from "./constants.js";
