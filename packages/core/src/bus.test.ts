import { describe, it, expect, vi } from "vitest";
import type { SessionId } from "@helpdesk/types";
import { InMemoryEventBus, createEvent, createTraceContext } from "./bus.js";

describe("InMemoryEventBus", () => {
  it("delivers matching events and propagates trace context", async () => {
    const bus = new InMemoryEventBus();
    const handler = vi.fn();
    const sub = bus.subscribe({ topics: ["turn.started"] }, handler);

    const traceCtx = createTraceContext();
    const event = createEvent("turn.started", { input: "hi" }, traceCtx);
    await bus.publish(event);
    await bus.publish(createEvent("turn.completed", {}, traceCtx));

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(event);
    expect(handler.mock.calls[0][0].traceCtx.traceId).toBe(traceCtx.traceId);

    sub.unsubscribe();
    await bus.publish(event);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("filters by session and node", async () => {
    const bus = new InMemoryEventBus();
    const handler = vi.fn();
    bus.subscribe({ sessionId: "s-1" as SessionId, node: "OrderAgent" }, handler);

    const trace = createTraceContext();
    await bus.publish(createEvent("node.entered", {}, trace, { sessionId: "s-1" as SessionId, node: "OrderAgent" }));
    await bus.publish(createEvent("node.entered", {}, trace, { sessionId: "s-2" as SessionId, node: "OrderAgent" }));
    await bus.publish(createEvent("node.entered", {}, trace, { sessionId: "s-1" as SessionId, node: "BillingAgent" }));

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("keeps publishing when a handler throws", async () => {
    const bus = new InMemoryEventBus();
    const good = vi.fn();
    bus.subscribe({}, () => {
      throw new Error("boom");
    });
    bus.subscribe({}, async () => {
      throw new Error("async boom");
    });
    bus.subscribe({}, good);

    await expect(bus.publish(createEvent("tool.result", {}, createTraceContext()))).resolves.toBeUndefined();
    expect(good).toHaveBeenCalledTimes(1);
  });

  it("creates child spans under the same trace", () => {
    const root = createTraceContext();
    const child = createTraceContext(root);
    expect(child.traceId).toBe(root.traceId);
    expect(child.parentSpanId).toBe(root.spanId);
    expect(child.spanId).not.toBe(root.spanId);
  });
});
