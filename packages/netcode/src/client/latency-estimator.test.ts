import { beforeEach, describe, expect, test } from "vitest";
import { LatencyEstimator } from "./latency-estimator.js";

describe("LatencyEstimator", () => {
  let now: number;
  let estimator: LatencyEstimator;

  beforeEach(() => {
    now = 1000;
    estimator = new LatencyEstimator(400, 0.7, () => now);
  });

  test("should start from the initial estimate", () => {
    expect(estimator.getEstimate()).toBe(400);
    expect(estimator.isPending()).toBe(false);
  });

  test("should fold a measurement in with the moving average", () => {
    estimator.onInputSent();
    now = 1100;

    // 400 * 0.7 + 100 * 0.3
    expect(estimator.onSnapshot()).toBe(310);
    expect(estimator.getEstimate()).toBe(310);
    expect(estimator.isPending()).toBe(false);
  });

  test("should keep only one measurement in flight", () => {
    estimator.onInputSent();
    now = 1050;
    estimator.onInputSent();
    now = 1400;

    // sample is 400, measured from the first send
    expect(estimator.onSnapshot()).toBe(400);
  });

  test("should ignore snapshots when nothing is pending", () => {
    now = 5000;
    expect(estimator.onSnapshot()).toBeUndefined();
    expect(estimator.getEstimate()).toBe(400);
  });

  test("should round estimates to whole milliseconds", () => {
    estimator.onInputSent();
    now = 1001;
    // 280 + 0.3
    expect(estimator.onSnapshot()).toBe(280);
  });

  test("should reset to the initial estimate", () => {
    estimator.onInputSent();
    now = 1100;
    estimator.onSnapshot();
    estimator.onInputSent();
    estimator.reset();

    expect(estimator.getEstimate()).toBe(400);
    expect(estimator.isPending()).toBe(false);
  });

  test("should reject smoothing outside [0, 1]", () => {
    expect(() => new LatencyEstimator(400, 1.5)).toThrow(
      "LatencyEstimator smoothing must be within [0, 1]. Got: 1.5",
    );
  });
});
