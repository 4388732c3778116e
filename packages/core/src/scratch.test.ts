import { describe, it, expect } from "vitest";
import type { ScratchMutation } from "@helpdesk/types";
import { CancellationError } from "./errors.js";
import { ScratchScope, applyRetention, matchesKeyPattern } from "./scratch.js";

describe("ScratchScope", () => {
  it("threads writes through a shared namespace", () => {
    const store = new Map<string, unknown>();
    const root = ScratchScope.root(store);
    root.forNode("first").set("issue", "login crash");
    expect(root.forNode("second").get("issue")).toBe("login crash");
  });

  it("partitions parallel children and hides siblings", () => {
    const store = new Map<string, unknown>([["lastOrderId", "12345"]]);
    const journal: ScratchMutation[] = [];
    const root = ScratchScope.root(store, journal);

    const web = root.partition("Gather", "Web");
    const kb = root.partition("Gather", "Kb");
    web.set("result", "web hits");
    kb.set("result", "kb hits");

    expect(store.get("Gather/Web/result")).toBe("web hits");
    expect(store.get("Gather/Kb/result")).toBe("kb hits");
    expect(web.get("result")).toBe("web hits");
    expect(kb.get("result")).toBe("kb hits");
    // parent keys stay readable
    expect(web.get("lastOrderId")).toBe("12345");
    // sibling partition is not
    expect(kb.get("Gather/Web/result")).toBeUndefined();
    expect(kb.has("Gather/Web/result")).toBe(false);
    expect(kb.snapshot()).toEqual({ lastOrderId: "12345", result: "kb hits" });

    expect(journal).toEqual([
      { key: "Gather/Web/result", node: "Web", op: "set" },
      { key: "Gather/Kb/result", node: "Kb", op: "set" },
    ]);
    // after the join the parent sees every partition
    expect(root.snapshot()).toEqual({
      lastOrderId: "12345",
      "Gather/Web/result": "web hits",
      "Gather/Kb/result": "kb hits",
    });
  });

  it("selects visible keys by pattern", () => {
    const store = new Map<string, unknown>([
      ["order.last", "12345"],
      ["order.count", 2],
      ["lastTicketId", "TICKET-1001"],
    ]);
    const root = ScratchScope.root(store);
    expect(root.select(["order.*"])).toEqual({ "order.last": "12345", "order.count": 2 });
  });

  it("journals deletes only when the key existed", () => {
    const journal: ScratchMutation[] = [];
    const root = ScratchScope.root(new Map([["a", 1]]), journal, "n");
    expect(root.delete("a")).toBe(true);
    expect(root.delete("a")).toBe(false);
    expect(journal).toEqual([{ key: "a", node: "n", op: "delete" }]);
  });

  it("refuses writes through every derived scope once sealed", () => {
    const store = new Map<string, unknown>([["lastOrderId", "12345"]]);
    const journal: ScratchMutation[] = [];
    const root = ScratchScope.root(store, journal);
    const branch = root.partition("Gather", "Web").forNode("Web");

    root.seal();

    expect(branch.sealed).toBe(true);
    expect(() => branch.set("late", 1)).toThrow(CancellationError);
    expect(() => branch.set("late", 1)).toThrow("Scratch write to Gather/Web/late by Web after the turn ended");
    expect(() => root.delete("lastOrderId")).toThrow(CancellationError);
    expect(branch.get("lastOrderId")).toBe("12345");
    expect([...store.keys()]).toEqual(["lastOrderId"]);
    expect(journal).toEqual([]);
  });
});

describe("retention", () => {
  it("matches exact keys and trailing-star prefixes", () => {
    expect(matchesKeyPattern("lastTicketId", "lastTicketId")).toBe(true);
    expect(matchesKeyPattern("lastTicketIds", "lastTicketId")).toBe(false);
    expect(matchesKeyPattern("order.last", "order.*")).toBe(true);
  });

  it("clears turn-scoped keys written during the turn", () => {
    const store = new Map<string, unknown>([["seeded", true]]);
    const journal: ScratchMutation[] = [];
    const root = ScratchScope.root(store, journal, "Escalation");
    root.set("lastTicketId", "TICKET-1001");
    root.partition("Gather", "Web").set("result", "hits");

    const removed = applyRetention(store, journal, ["lastTicketId"]);

    expect(removed).toEqual(["Gather/Web/result"]);
    expect([...store.keys()].sort()).toEqual(["lastTicketId", "seeded"]);
  });
});
