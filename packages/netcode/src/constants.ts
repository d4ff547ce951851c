/**
 * Default configuration constants for the netcode library
 */

/**
 * Default simulated one-way latency: 200ms.
 *
 * Applied independently on every delayed leg. A message from client to server
 * passes two legs (client outbound, server inbound), so it arrives after
 * 2x this value; the reply passes two more. An input-triggered state change is
 * therefore visible to its sender after 4x this value. The reconciliation snap
 * distance and the extrapolation horizon are tuned against that doubling.
 */
export const DEFAULT_SIMULATED_LATENCY_MS = 200;

/**
 * How often delayed queues are polled for due messages: 5ms.
 * Polling keeps one cheap interval per endpoint instead of a timer per message.
 */
export const DEFAULT_DELIVERY_POLL_INTERVAL_MS = 5;

/**
 * Render remote entities this far in the past so two bracketing samples are
 * usually buffered.
 */
export const DEFAULT_INTERPOLATION_DELAY_MS = 100;

/**
 * Maximum time a remote entity is projected past its newest sample when the
 * feed stalls.
 */
export const MAX_EXTRAPOLATION_MS = 200;

/**
 * Position samples kept per remote entity.
 * At 20 Hz broadcasts this is one second of history.
 */
export const DEFAULT_HISTORY_CAPACITY = 20;

/**
 * Weight of the previous estimate when folding a new round-trip sample into
 * the latency indicator (exponential moving average).
 */
export const LATENCY_SMOOTHING_WEIGHT = 0.7;
