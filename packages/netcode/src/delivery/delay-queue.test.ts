import { beforeEach, describe, expect, test } from "vitest";
import { DelayQueue } from "./delay-queue.js";

describe("DelayQueue", () => {
  let now: number;
  let queue: DelayQueue<string>;
  const clock = () => now;

  beforeEach(() => {
    now = 1000;
    queue = new DelayQueue<string>(100, clock);
  });

  const drainAll = (): string[] => {
    const delivered: string[] = [];
    queue.drain((payload) => delivered.push(payload));
    return delivered;
  };

  describe("enqueue", () => {
    test("should stamp delivery time as now + latency", () => {
      queue.enqueue("a");
      expect(queue.peekDeliverAt()).toBe(1100);
      expect(queue.size()).toBe(1);
    });

    test("should reject negative latency", () => {
      expect(() => new DelayQueue<string>(-1, clock)).toThrow(
        "DelayQueue latency must be a non-negative number. Got: -1",
      );
    });
  });

  describe("drain", () => {
    test("should hold payloads until they are due", () => {
      queue.enqueue("a");

      now = 1099;
      expect(drainAll()).toEqual([]);

      now = 1100;
      expect(drainAll()).toEqual(["a"]);
      expect(queue.size()).toBe(0);
    });

    test("should deliver in enqueue order", () => {
      queue.enqueue("first");
      queue.enqueue("second");
      queue.enqueue("third");

      now = 2000;
      expect(drainAll()).toEqual(["first", "second", "third"]);
    });

    test("should stop at the first entry that is not yet due", () => {
      queue.enqueue("early");
      now = 1050;
      queue.enqueue("late");

      now = 1120;
      expect(drainAll()).toEqual(["early"]);
      expect(queue.peekDeliverAt()).toBe(1150);

      now = 1150;
      expect(drainAll()).toEqual(["late"]);
    });

    test("should return the number delivered", () => {
      queue.enqueue("a");
      queue.enqueue("b");
      now = 1100;

      expect(queue.drain(() => {})).toBe(2);
      expect(queue.drain(() => {})).toBe(0);
    });

    test("should keep order across many partial drains", () => {
      const delivered: number[] = [];
      const numbers = new DelayQueue<number>(10, clock);
      for (let i = 0; i < 300; i++) {
        numbers.enqueue(i);
        now += 1;
        numbers.drain((n) => delivered.push(n));
      }
      now += 10;
      numbers.drain((n) => delivered.push(n));

      expect(delivered).toEqual(Array.from({ length: 300 }, (_, i) => i));
      expect(numbers.size()).toBe(0);
    });

    test("should deliver immediately with zero latency on the next drain", () => {
      const instant = new DelayQueue<string>(0, clock);
      instant.enqueue("now");
      const delivered: string[] = [];
      instant.drain((p) => delivered.push(p));
      expect(delivered).toEqual(["now"]);
    });
  });

  describe("clear", () => {
    test("should drop pending payloads", () => {
      queue.enqueue("a");
      queue.enqueue("b");
      queue.clear();

      now = 5000;
      expect(drainAll()).toEqual([]);
      expect(queue.size()).toBe(0);
      expect(queue.peekDeliverAt()).toBeUndefined();
    });
  });
});
