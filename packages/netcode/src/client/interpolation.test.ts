import { beforeEach, describe, expect, test } from "vitest";
import { vec2 } from "../core/math.js";
import { EntityHistory, InterpolationBuffer } from "./interpolation.js";

describe("EntityHistory", () => {
  let history: EntityHistory;

  beforeEach(() => {
    history = new EntityHistory(20, 200);
  });

  describe("positionAt", () => {
    test("should return undefined with no samples", () => {
      expect(history.positionAt(0)).toBeUndefined();
    });

    test("should return the only sample regardless of render time", () => {
      history.addSample(100, vec2(7, 8));
      expect(history.positionAt(0)).toEqual({ x: 7, y: 8 });
      expect(history.positionAt(500)).toEqual({ x: 7, y: 8 });
    });

    test("should interpolate between bracketing samples", () => {
      history.addSample(0, vec2(0, 0));
      history.addSample(100, vec2(10, 0));

      expect(history.positionAt(50)).toEqual({ x: 5, y: 0 });
      expect(history.positionAt(25)).toEqual({ x: 2.5, y: 0 });
    });

    test("should return the exact sample at its timestamp", () => {
      history.addSample(0, vec2(0, 0));
      history.addSample(100, vec2(10, 0));
      history.addSample(200, vec2(30, 0));

      expect(history.positionAt(100)).toEqual({ x: 10, y: 0 });
    });

    test("should hold the oldest sample before the buffered range", () => {
      history.addSample(100, vec2(1, 1));
      history.addSample(200, vec2(2, 2));

      expect(history.positionAt(50)).toEqual({ x: 1, y: 1 });
    });

    test("should extrapolate past the newest sample", () => {
      history.addSample(0, vec2(0, 0));
      history.addSample(100, vec2(10, 0));

      expect(history.positionAt(150)).toEqual({ x: 15, y: 0 });
    });

    test("should cap extrapolation", () => {
      history.addSample(0, vec2(0, 0));
      history.addSample(100, vec2(10, 0));

      // 200 past the newest sample at most
      expect(history.positionAt(300)).toEqual({ x: 30, y: 0 });
      expect(history.positionAt(1000)).toEqual({ x: 30, y: 0 });
    });

    test("should return the newest sample when the last two share a timestamp", () => {
      history.addSample(100, vec2(1, 0));
      history.addSample(100, vec2(2, 0));

      expect(history.positionAt(150)).toEqual({ x: 2, y: 0 });
    });

    test("should not expose stored positions to callers", () => {
      const position = vec2(5, 5);
      history.addSample(0, position);
      position.x = 100;

      const rendered = history.positionAt(0);
      expect(rendered).toEqual({ x: 5, y: 5 });
    });
  });

  test("should evict the oldest samples beyond capacity", () => {
    const small = new EntityHistory(3, 200);
    small.addSample(0, vec2(0, 0));
    small.addSample(100, vec2(1, 0));
    small.addSample(200, vec2(2, 0));
    small.addSample(300, vec2(3, 0));

    expect(small.size()).toBe(3);
    // sample at 0 is gone, so the oldest retained one is held
    expect(small.positionAt(0)).toEqual({ x: 1, y: 0 });
    expect(small.latest()).toEqual({ timestamp: 300, position: { x: 3, y: 0 } });
  });
});

describe("InterpolationBuffer", () => {
  let buffer: InterpolationBuffer;

  beforeEach(() => {
    buffer = new InterpolationBuffer({ historyCapacity: 20, maxExtrapolation: 200 });
  });

  test("should track each entity separately", () => {
    buffer.addSample("a", 0, vec2(0, 0));
    buffer.addSample("a", 100, vec2(100, 0));
    buffer.addSample("b", 0, vec2(0, 0));
    buffer.addSample("b", 100, vec2(0, 50));

    expect(buffer.renderPosition("a", 50)).toEqual({ x: 50, y: 0 });
    expect(buffer.renderPosition("b", 50)).toEqual({ x: 0, y: 25 });
    expect(buffer.renderPosition("c", 50)).toBeUndefined();
  });

  test("should render every tracked entity", () => {
    buffer.addSample("a", 0, vec2(1, 1));
    buffer.addSample("b", 0, vec2(2, 2));

    const positions = buffer.renderPositions(0);
    expect(positions.size).toBe(2);
    expect(positions.get("a")).toEqual({ x: 1, y: 1 });
    expect(positions.get("b")).toEqual({ x: 2, y: 2 });
  });

  test("should remove an entity", () => {
    buffer.addSample("a", 0, vec2(1, 1));
    buffer.remove("a");

    expect(buffer.has("a")).toBe(false);
    expect(buffer.renderPosition("a", 0)).toBeUndefined();
  });

  test("should drop entities missing from the live set", () => {
    buffer.addSample("a", 0, vec2(1, 1));
    buffer.addSample("b", 0, vec2(2, 2));
    buffer.addSample("c", 0, vec2(3, 3));

    const removed = buffer.retainOnly(new Set(["b"]));

    expect(removed.sort()).toEqual(["a", "c"]);
    expect(buffer.entityIds()).toEqual(["b"]);
  });

  test("should forget everything on clear", () => {
    buffer.addSample("a", 0, vec2(1, 1));
    buffer.clear();
    expect(buffer.entityIds()).toEqual([]);
  });
});
