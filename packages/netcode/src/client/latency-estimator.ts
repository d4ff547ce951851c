import { LATENCY_SMOOTHING_WEIGHT } from "../constants.js";
import type { Clock } from "../core/types.js";

/**
 * User-facing round-trip indicator.
 *
 * One measurement is in flight at a time: sending an input stamps the send
 * time unless a measurement is already pending, and the next authoritative
 * snapshot closes it. Samples are folded in with an exponential moving
 * average. This is a display value, never a protocol control input.
 */
export class LatencyEstimator {
  private estimateMs: number;
  private readonly initialMs: number;
  private readonly smoothing: number;
  private readonly now: Clock;
  private pendingSince: number | null = null;

  /**
   * @param initialMs - Starting estimate, usually twice the configured one-way latency
   * @param smoothing - Weight kept from the previous estimate (default: 0.7)
   */
  constructor(initialMs: number, smoothing: number = LATENCY_SMOOTHING_WEIGHT, now: Clock = Date.now) {
    if (smoothing < 0 || smoothing > 1) {
      throw new Error(`LatencyEstimator smoothing must be within [0, 1]. Got: ${smoothing}`);
    }
    this.estimateMs = Math.round(initialMs);
    this.initialMs = this.estimateMs;
    this.smoothing = smoothing;
    this.now = now;
  }

  /**
   * Call when an input goes out. Starts a measurement if none is pending.
   */
  onInputSent(): void {
    if (this.pendingSince === null) {
      this.pendingSince = this.now();
    }
  }

  /**
   * Call when an authoritative snapshot arrives. Closes a pending measurement.
   * @returns the new estimate, or undefined if nothing was pending
   */
  onSnapshot(): number | undefined {
    if (this.pendingSince === null) {
      return undefined;
    }
    const sample = this.now() - this.pendingSince;
    this.pendingSince = null;
    this.estimateMs = Math.round(this.estimateMs * this.smoothing + sample * (1 - this.smoothing));
    return this.estimateMs;
  }

  isPending(): boolean {
    return this.pendingSince !== null;
  }

  getEstimate(): number {
    return this.estimateMs;
  }

  reset(): void {
    this.estimateMs = this.initialMs;
    this.pendingSince = null;
  }
}
