import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { createTransportPair } from "../transport/memory.js";
import { sendIfOpen } from "../transport/transport.js";
import { DeliverySimulator } from "./delivery-simulator.js";
import { HandoffQueue } from "./handoff-queue.js";

describe("DeliverySimulator", () => {
  let inbound: string[];
  let outbound: string[];
  let simulator: DeliverySimulator<string, string>;

  beforeEach(() => {
    vi.useFakeTimers();
    inbound = [];
    outbound = [];
    simulator = new DeliverySimulator<string, string>({
      latencyMs: 200,
      pollIntervalMs: 5,
      deliverInbound: (text) => inbound.push(text),
      deliverOutbound: (text) => outbound.push(text),
    });
  });

  afterEach(() => {
    simulator.stop();
    vi.useRealTimers();
  });

  describe("start/stop", () => {
    test("should start and stop polling", () => {
      expect(simulator.isRunning()).toBe(false);

      simulator.start();
      expect(simulator.isRunning()).toBe(true);

      simulator.stop();
      expect(simulator.isRunning()).toBe(false);
    });

    test("should not start twice", () => {
      simulator.start();
      simulator.start();
      expect(simulator.isRunning()).toBe(true);
      expect(vi.getTimerCount()).toBe(1);
    });

    test("should reject a non-positive poll interval", () => {
      expect(
        () =>
          new DeliverySimulator<string, string>({
            pollIntervalMs: 0,
            deliverInbound: () => {},
            deliverOutbound: () => {},
          }),
      ).toThrow("[DeliverySimulator] pollIntervalMs must be a positive finite number. Got: 0");
    });
  });

  describe("latency", () => {
    test("should deliver outbound messages no earlier than the latency", () => {
      simulator.start();
      simulator.send("hello");

      vi.advanceTimersByTime(199);
      expect(outbound).toEqual([]);

      vi.advanceTimersByTime(1);
      expect(outbound).toEqual(["hello"]);
    });

    test("should delay inbound messages by the same latency", () => {
      simulator.start();
      simulator.receive("from peer");

      vi.advanceTimersByTime(195);
      expect(inbound).toEqual([]);

      vi.advanceTimersByTime(5);
      expect(inbound).toEqual(["from peer"]);
    });

    test("should keep send order", () => {
      simulator.start();
      simulator.send("1");
      vi.advanceTimersByTime(3);
      simulator.send("2");
      simulator.send("3");

      vi.advanceTimersByTime(300);
      expect(outbound).toEqual(["1", "2", "3"]);
    });

    test("should hold messages while stopped", () => {
      simulator.send("queued");
      vi.advanceTimersByTime(1000);

      expect(outbound).toEqual([]);
      expect(simulator.pump()).toEqual({ inbound: 0, outbound: 1 });
      expect(outbound).toEqual(["queued"]);
    });

    test("should report the configured latency", () => {
      expect(simulator.getLatency()).toBe(200);
    });
  });

  describe("pump", () => {
    test("should drain inbound before outbound", () => {
      const order: string[] = [];
      const ordered = new DeliverySimulator<string, string>({
        latencyMs: 0,
        deliverInbound: (text) => order.push(`in:${text}`),
        deliverOutbound: (text) => order.push(`out:${text}`),
      });
      ordered.send("b");
      ordered.receive("a");

      expect(ordered.pump()).toEqual({ inbound: 1, outbound: 1 });
      expect(order).toEqual(["in:a", "out:b"]);
    });

    test("should drop everything on clear", () => {
      simulator.send("x");
      simulator.receive("y");
      simulator.clear();

      vi.advanceTimersByTime(500);
      expect(simulator.pump()).toEqual({ inbound: 0, outbound: 0 });
    });
  });

  describe("closed transports", () => {
    test("should drop frames addressed to a peer that closed while they were in flight", () => {
      const [clientEnd, serverEnd] = createTransportPair("peer-1");
      const received: string[] = [];
      clientEnd.onMessage((text) => received.push(text));

      const delivered: boolean[] = [];
      const toPeer = new DeliverySimulator<string, string>({
        latencyMs: 200,
        deliverInbound: () => {},
        deliverOutbound: (text) => delivered.push(sendIfOpen(serverEnd, text)),
      });
      toPeer.start();

      toPeer.send("before close");
      vi.advanceTimersByTime(200);
      toPeer.send("after close");
      clientEnd.close();
      vi.advanceTimersByTime(200);
      toPeer.stop();

      expect(received).toEqual(["before close"]);
      expect(delivered).toEqual([true, false]);
      expect(toPeer.pump()).toEqual({ inbound: 0, outbound: 0 });
    });
  });
});

describe("HandoffQueue", () => {
  test("should hand items over in push order", () => {
    const queue = new HandoffQueue<number>();
    queue.push(1);
    queue.push(2);

    expect(queue.size()).toBe(2);
    expect(queue.drainAll()).toEqual([1, 2]);
    expect(queue.size()).toBe(0);
    expect(queue.drainAll()).toEqual([]);
  });

  test("should not share the drained array with later pushes", () => {
    const queue = new HandoffQueue<string>();
    queue.push("a");
    const first = queue.drainAll();
    queue.push("b");

    expect(first).toEqual(["a"]);
    expect(queue.drainAll()).toEqual(["b"]);
  });

  test("should drop items on clear", () => {
    const queue = new HandoffQueue<string>();
    queue.push("a");
    queue.clear();
    expect(queue.drainAll()).toEqual([]);
  });
});
