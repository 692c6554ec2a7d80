import { afterEach, describe, expect, it, vi } from "vitest";

import { type AgentEvent, createEventBus } from "../events/eventBus";

describe("EventBus", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should deliver typed payloads to exact subscribers", () => {
    const bus = createEventBus();
    const seen: number[] = [];

    bus.on("turn:started", (event) => {
      seen.push(event.payload.turnIndex);
    });
    bus.emit("turn:started", { sessionId: "s-1", turnIndex: 3 });
    bus.emit("checkpoint:saved", { sessionId: "s-1", turnIndex: 9 });

    expect(seen).toEqual([3]);
  });

  it("should match category and full wildcards", () => {
    const bus = createEventBus();
    const toolEvents: string[] = [];
    const allEvents: string[] = [];

    bus.onPattern("watchdog:*", (event) => {
      toolEvents.push(event.type);
    });
    bus.onPattern("*", (event) => {
      allEvents.push(event.type);
    });

    bus.emit("watchdog:hint", { sessionId: "s-1", kind: "stall", message: "no progress" });
    bus.emit("turn:started", { sessionId: "s-1", turnIndex: 0 });

    expect(toolEvents).toEqual(["watchdog:hint"]);
    expect(allEvents).toEqual(["watchdog:hint", "turn:started"]);
  });

  it("should run handlers in priority order", () => {
    const bus = createEventBus();
    const order: string[] = [];

    bus.on("turn:started", () => {
      order.push("normal");
    });
    bus.onPattern("*", () => {
      order.push("low");
    }, { priority: "low" });
    bus.on(
      "turn:started",
      () => {
        order.push("critical");
      },
      { priority: "critical" }
    );

    bus.emit("turn:started", { sessionId: "s-1", turnIndex: 0 });

    expect(order).toEqual(["critical", "normal", "low"]);
  });

  it("should isolate the emitter from failing handlers", async () => {
    const bus = createEventBus();
    const after = vi.fn();

    bus.on("turn:started", () => {
      throw new Error("subscriber bug");
    });
    bus.on("turn:started", async () => {
      throw new Error("async subscriber bug");
    });
    bus.on("turn:started", after);

    expect(() => bus.emit("turn:started", { sessionId: "s-1", turnIndex: 0 })).not.toThrow();
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(after).toHaveBeenCalledTimes(1);
    expect(bus.getStats().handlerErrors).toBe(2);
  });

  it("should honor once and filters", () => {
    const bus = createEventBus();
    const once = vi.fn();
    const scoped = vi.fn();

    bus.once("checkpoint:saved", once);
    bus.on("checkpoint:saved", scoped, {
      filter: (event) => event.payload.sessionId === "s-2",
    });

    bus.emit("checkpoint:saved", { sessionId: "s-1", turnIndex: 0 });
    bus.emit("checkpoint:saved", { sessionId: "s-2", turnIndex: 0 });

    expect(once).toHaveBeenCalledTimes(1);
    expect(scoped).toHaveBeenCalledTimes(1);
    expect(scoped).toHaveBeenCalledWith(
      expect.objectContaining({ payload: { sessionId: "s-2", turnIndex: 0 } })
    );
  });

  it("should stop delivering after unsubscribe", () => {
    const bus = createEventBus();
    const handler = vi.fn();

    const subscription = bus.on("turn:started", handler);
    subscription.unsubscribe();
    bus.emit("turn:started", { sessionId: "s-1", turnIndex: 0 });

    expect(handler).not.toHaveBeenCalled();
    expect(bus.getStats().activeSubscriptions).toBe(0);
  });

  it("should resolve waitFor with the next matching event", async () => {
    const bus = createEventBus();

    const waiting = bus.waitFor("goal:verdict", {
      filter: (event) => event.payload.turnIndex === 2,
    });
    bus.emit("goal:verdict", { sessionId: "s-1", turnIndex: 1, verdict: { kind: "continue" } });
    bus.emit("goal:verdict", {
      sessionId: "s-1",
      turnIndex: 2,
      verdict: { kind: "accept", confidence: 1 },
    });

    const event = await waiting;
    expect(event.payload.verdict).toEqual({ kind: "accept", confidence: 1 });
  });

  it("should reject waitFor on timeout", async () => {
    vi.useFakeTimers();
    const bus = createEventBus();

    const waiting = bus.waitFor("run:completed", { timeoutMs: 50 });
    vi.advanceTimersByTime(60);

    await expect(waiting).rejects.toThrow("Timeout waiting for event: run:completed");
  });

  it("should keep a bounded history and replay it", () => {
    const bus = createEventBus({ maxHistorySize: 2 });

    bus.emit("turn:started", { sessionId: "s-1", turnIndex: 0 });
    bus.emit("turn:started", { sessionId: "s-1", turnIndex: 1 });
    bus.emit("checkpoint:saved", { sessionId: "s-1", turnIndex: 1 });

    expect(bus.getHistory().map((event) => event.type)).toEqual([
      "turn:started",
      "checkpoint:saved",
    ]);

    const replayed: AgentEvent[] = [];
    bus.onPattern("turn:*", (event) => {
      replayed.push(event);
    }, { replay: true });

    expect(replayed).toHaveLength(1);
    expect(replayed[0].payload).toEqual({ sessionId: "s-1", turnIndex: 1 });
  });

  it("should release listeners only through their own subscriptions", () => {
    const bus = createEventBus();
    const seen: number[] = [];
    const first = bus.on("turn:started", (event) => {
      seen.push(event.payload.turnIndex);
    });
    const second = bus.onPattern("*", () => {});

    first.unsubscribe();
    second.unsubscribe();
    bus.emit("turn:started", { sessionId: "s-1", turnIndex: 0 });

    expect(seen).toEqual([]);
    expect(bus.getStats().activeSubscriptions).toBe(0);
    expect("removeAllListeners" in bus).toBe(false);
    expect("clearHistory" in bus).toBe(false);
  });
});
